import { DeviceTR64 } from '../device'
import { readBool, readInt, readString } from '../result'
import type { ActionResult } from '../soap'
import { findServiceType, flag } from './lookup'
import type { ServiceTypeLookup } from './lookup'

type WanMethod =
  | 'getLinkInfo'
  | 'getLinkProperties'
  | 'getADSLInfo'
  | 'getEthernetLinkStatus'
  | 'getByteStatistic'
  | 'getPacketStatistic'
  | 'getConnectionInfo'
  | 'setEnable'
  | 'requestConnection'
  | 'terminateConnection'

export interface WanLinkInfo {
  readonly enabled: boolean
  readonly status: string
  readonly dataPath: string
  readonly upstreamCurrentRate: number
  readonly downstreamCurrentRate: number
  readonly upstreamMaxRate: number
  readonly downstreamMaxRate: number
  readonly raw: ActionResult
}

export interface WanLinkProperties {
  readonly accessType: string
  readonly upstreamMaxBitRate: number
  readonly downstreamMaxBitRate: number
  readonly linkStatus: string
  readonly raw: ActionResult
}

export interface ADSLInfo {
  readonly enabled: boolean
  readonly status: string
  readonly linkType: string
  readonly destinationAddress: string
  readonly raw: ActionResult
}

export interface ConnectionInfo {
  readonly enabled: boolean
  readonly status: string
  readonly type: string
  readonly name: string
  /** seconds since the connection has been established */
  readonly uptime: number
  readonly lastConnectionError: string
  readonly natEnabled: boolean
  readonly externalIPAddress: string
  readonly dnsServers: string
  readonly macAddress: string
  readonly dnsEnabled: boolean
  readonly raw: ActionResult
}

export const toWanLinkInfo = (raw: ActionResult): WanLinkInfo => ({
  enabled: readBool(raw, 'NewEnable'),
  status: readString(raw, 'NewStatus'),
  dataPath: readString(raw, 'NewDataPath'),
  upstreamCurrentRate: readInt(raw, 'NewUpstreamCurrRate'),
  downstreamCurrentRate: readInt(raw, 'NewDownstreamCurrRate'),
  upstreamMaxRate: readInt(raw, 'NewUpstreamMaxRate'),
  downstreamMaxRate: readInt(raw, 'NewDownstreamMaxRate'),
  raw,
})

export const toWanLinkProperties = (raw: ActionResult): WanLinkProperties => ({
  accessType: readString(raw, 'NewWANAccessType'),
  upstreamMaxBitRate: readInt(raw, 'NewLayer1UpstreamMaxBitRate'),
  downstreamMaxBitRate: readInt(raw, 'NewLayer1DownstreamMaxBitRate'),
  linkStatus: readString(raw, 'NewPhysicalLinkStatus'),
  raw,
})

export const toADSLInfo = (raw: ActionResult): ADSLInfo => ({
  enabled: readBool(raw, 'NewEnable'),
  status: readString(raw, 'NewLinkStatus'),
  linkType: readString(raw, 'NewLinkType'),
  destinationAddress: readString(raw, 'NewDestinationAddress'),
  raw,
})

export const toConnectionInfo = (raw: ActionResult): ConnectionInfo => ({
  enabled: readBool(raw, 'NewEnable'),
  status: readString(raw, 'NewConnectionStatus'),
  type: readString(raw, 'NewConnectionType'),
  name: readString(raw, 'NewName'),
  uptime: readInt(raw, 'NewUptime'),
  lastConnectionError: readString(raw, 'NewLastConnectionError'),
  natEnabled: readBool(raw, 'NewNATEnabled'),
  externalIPAddress: readString(raw, 'NewExternalIPAddress'),
  dnsServers: readString(raw, 'NewDNSServers'),
  macAddress: readString(raw, 'NewMACAddress'),
  dnsEnabled: readBool(raw, 'NewDNSEnabled'),
  raw,
})

/**
 * WAN information of a device supporting the
 * `urn:dslforum-org:service:WAN*` services
 */
export class Wan extends DeviceTR64 {
  static readonly serviceTypeLookup: ServiceTypeLookup<WanMethod> = {
    getLinkInfo: 'urn:dslforum-org:service:WANDSLInterfaceConfig:',
    getLinkProperties: 'urn:dslforum-org:service:WANCommonInterfaceConfig:',
    getADSLInfo: 'urn:dslforum-org:service:WANDSLLinkConfig:',
    getEthernetLinkStatus: 'urn:dslforum-org:service:WANEthernetLinkConfig:',
    getByteStatistic: 'urn:dslforum-org:service:WANCommonInterfaceConfig:',
    getPacketStatistic: 'urn:dslforum-org:service:WANCommonInterfaceConfig:',
    getConnectionInfo: 'urn:dslforum-org:service:WANIPConnection:',
    setEnable: 'urn:dslforum-org:service:WANDSLLinkConfig:',
    requestConnection: 'urn:dslforum-org:service:WANIPConnection:',
    terminateConnection: 'urn:dslforum-org:service:WANIPConnection:',
  }

  static getServiceType(method: string): string | undefined {
    return findServiceType(Wan.serviceTypeLookup, method)
  }

  protected wanAction(
    method: WanMethod,
    wanInterfaceId: number,
    action: string,
    args: Record<string, number> = {},
    timeout = 1000
  ) {
    const serviceType = Wan.serviceTypeLookup[method] + wanInterfaceId
    return this.executeAction(serviceType, action, args, timeout)
  }

  async getLinkInfo(wanInterfaceId = 1, timeout?: number) {
    const result = await this.wanAction(
      'getLinkInfo',
      wanInterfaceId,
      'GetInfo',
      {},
      timeout
    )
    return toWanLinkInfo(result)
  }

  async getLinkProperties(wanInterfaceId = 1, timeout?: number) {
    const result = await this.wanAction(
      'getLinkProperties',
      wanInterfaceId,
      'GetCommonLinkProperties',
      {},
      timeout
    )
    return toWanLinkProperties(result)
  }

  async getADSLInfo(wanInterfaceId = 1, timeout?: number) {
    const result = await this.wanAction(
      'getADSLInfo',
      wanInterfaceId,
      'GetInfo',
      {},
      timeout
    )
    return toADSLInfo(result)
  }

  async getEthernetLinkStatus(wanInterfaceId = 1, timeout?: number) {
    const result = await this.wanAction(
      'getEthernetLinkStatus',
      wanInterfaceId,
      'GetEthernetLinkStatus',
      {},
      timeout
    )
    return readString(result, 'NewEthernetLinkStatus')
  }

  /**
   * total bytes sent and received, requested by two separate calls
   */
  async getByteStatistic(
    wanInterfaceId = 1,
    timeout?: number
  ): Promise<[number, number]> {
    const sent = await this.wanAction(
      'getByteStatistic',
      wanInterfaceId,
      'GetTotalBytesSent',
      {},
      timeout
    )
    const received = await this.wanAction(
      'getByteStatistic',
      wanInterfaceId,
      'GetTotalBytesReceived',
      {},
      timeout
    )
    return [
      readInt(sent, 'NewTotalBytesSent'),
      readInt(received, 'NewTotalBytesReceived'),
    ]
  }

  /**
   * total packets sent and received, requested by two separate calls
   */
  async getPacketStatistic(
    wanInterfaceId = 1,
    timeout?: number
  ): Promise<[number, number]> {
    const sent = await this.wanAction(
      'getPacketStatistic',
      wanInterfaceId,
      'GetTotalPacketsSent',
      {},
      timeout
    )
    const received = await this.wanAction(
      'getPacketStatistic',
      wanInterfaceId,
      'GetTotalPacketsReceived',
      {},
      timeout
    )
    return [
      readInt(sent, 'NewTotalPacketsSent'),
      readInt(received, 'NewTotalPacketsReceived'),
    ]
  }

  async getConnectionInfo(wanInterfaceId = 1, timeout?: number) {
    const result = await this.wanAction(
      'getConnectionInfo',
      wanInterfaceId,
      'GetInfo',
      {},
      timeout
    )
    return toConnectionInfo(result)
  }

  async setEnable(status: boolean, wanInterfaceId = 1, timeout?: number) {
    await this.wanAction(
      'setEnable',
      wanInterfaceId,
      'SetEnable',
      { NewEnable: flag(status) },
      timeout
    )
  }

  async requestConnection(wanInterfaceId = 1, timeout?: number) {
    await this.wanAction(
      'requestConnection',
      wanInterfaceId,
      'RequestConnection',
      {},
      timeout
    )
  }

  async terminateConnection(wanInterfaceId = 1, timeout?: number) {
    await this.wanAction(
      'terminateConnection',
      wanInterfaceId,
      'ForceTermination',
      {},
      timeout
    )
  }
}
