export type Protocol = 'http' | 'https'

export interface DeviceTR64Options {
  host: string
  /** 49000 for http, 49443 for https on a Fritz!Box */
  port: number
  protocol: Protocol
  username?: string
  password?: string
  httpProxy?: string
  httpsProxy?: string
  rejectUnauthorized: boolean
}

export interface DeviceEvent {
  sid: string
  seq?: number
  /** only known for events received through [[DeviceTR64.observe]] */
  serviceType?: string
  variable: string
  value: string
}

export interface SubscriptionResult {
  sid: string
  timeout?: string
}

export interface ActionSummary {
  name: string
  parameter: string[]
  return: string[]
}

export interface ServiceSummary {
  serviceType: string
  controlURL: string
  scpdURL?: string
  eventSubURL?: string
  actions: ActionSummary[]
  events: string[]
  error?: string
}
