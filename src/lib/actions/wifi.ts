import { DeviceTR64 } from '../device'
import { readBool, readInt, readString } from '../result'
import type { ActionResult } from '../soap'
import { findServiceType, flag } from './lookup'
import type { ServiceTypeLookup } from './lookup'

type WifiMethod =
  | 'getWifiInfo'
  | 'getStatistic'
  | 'getPacketStatistic'
  | 'getTotalAssociations'
  | 'getGenericAssociatedDeviceInfo'
  | 'getSpecificAssociatedDeviceInfo'
  | 'setEnable'
  | 'setChannel'
  | 'setSSID'

export interface WifiBasicInfo {
  readonly enabled: boolean
  readonly status: string
  readonly channel: number
  readonly ssid: string
  readonly beaconType: string
  readonly macControl: boolean
  readonly standard: string
  readonly bssid: string
  readonly encryptionMode: string
  readonly authMode: string
  readonly raw: ActionResult
}

export interface WifiDeviceInfo {
  readonly macAddress: string
  readonly ipAddress: string
  readonly authenticated: boolean
  readonly raw: ActionResult
}

export const toWifiBasicInfo = (raw: ActionResult): WifiBasicInfo => ({
  enabled: readBool(raw, 'NewEnable'),
  status: readString(raw, 'NewStatus'),
  channel: readInt(raw, 'NewChannel'),
  ssid: readString(raw, 'NewSSID'),
  beaconType: readString(raw, 'NewBeaconType'),
  macControl: readBool(raw, 'NewMACAddressControlEnabled'),
  standard: readString(raw, 'NewStandard'),
  bssid: readString(raw, 'NewBSSID'),
  encryptionMode: readString(raw, 'NewBasicEncryptionModes'),
  authMode: readString(raw, 'NewBasicAuthenticationMode'),
  raw,
})

export const toWifiDeviceInfo = (
  raw: ActionResult,
  macAddress?: string
): WifiDeviceInfo => ({
  macAddress: macAddress ?? readString(raw, 'NewAssociatedDeviceMACAddress'),
  ipAddress: readString(raw, 'NewAssociatedDeviceIPAddress'),
  authenticated: readBool(raw, 'NewAssociatedDeviceAuthState'),
  raw,
})

/**
 * wifi information and settings of a device supporting
 * `urn:dslforum-org:service:WLANConfiguration:X`, every radio or guest
 * network of a device has its own interface id
 */
export class Wifi extends DeviceTR64 {
  static readonly serviceTypeLookup: ServiceTypeLookup<WifiMethod> = {
    getWifiInfo: 'urn:dslforum-org:service:WLANConfiguration:',
    getStatistic: 'urn:dslforum-org:service:WLANConfiguration:',
    getPacketStatistic: 'urn:dslforum-org:service:WLANConfiguration:',
    getTotalAssociations: 'urn:dslforum-org:service:WLANConfiguration:',
    getGenericAssociatedDeviceInfo:
      'urn:dslforum-org:service:WLANConfiguration:',
    getSpecificAssociatedDeviceInfo:
      'urn:dslforum-org:service:WLANConfiguration:',
    setEnable: 'urn:dslforum-org:service:WLANConfiguration:',
    setChannel: 'urn:dslforum-org:service:WLANConfiguration:',
    setSSID: 'urn:dslforum-org:service:WLANConfiguration:',
  }

  static getServiceType(method: string): string | undefined {
    return findServiceType(Wifi.serviceTypeLookup, method)
  }

  protected wifiAction(
    method: WifiMethod,
    wifiInterfaceId: number,
    action: string,
    args: Record<string, string | number> = {},
    timeout = 1000
  ) {
    const serviceType = Wifi.serviceTypeLookup[method] + wifiInterfaceId
    return this.executeAction(serviceType, action, args, timeout)
  }

  async getWifiInfo(
    wifiInterfaceId = 1,
    timeout?: number
  ): Promise<WifiBasicInfo> {
    const result = await this.wifiAction(
      'getWifiInfo',
      wifiInterfaceId,
      'GetInfo',
      {},
      timeout
    )
    return toWifiBasicInfo(result)
  }

  /**
   * packets sent and received
   */
  async getStatistic(
    wifiInterfaceId = 1,
    timeout?: number
  ): Promise<[number, number]> {
    const result = await this.wifiAction(
      'getStatistic',
      wifiInterfaceId,
      'GetStatistics',
      {},
      timeout
    )
    return [
      readInt(result, 'NewTotalPacketsSent'),
      readInt(result, 'NewTotalPacketsReceived'),
    ]
  }

  async getPacketStatistic(
    wifiInterfaceId = 1,
    timeout?: number
  ): Promise<[number, number]> {
    const result = await this.wifiAction(
      'getPacketStatistic',
      wifiInterfaceId,
      'GetPacketStatistics',
      {},
      timeout
    )
    return [
      readInt(result, 'NewTotalPacketsSent'),
      readInt(result, 'NewTotalPacketsReceived'),
    ]
  }

  /** amount of wifi clients currently associated */
  async getTotalAssociations(wifiInterfaceId = 1, timeout?: number) {
    const result = await this.wifiAction(
      'getTotalAssociations',
      wifiInterfaceId,
      'GetTotalAssociations',
      {},
      timeout
    )
    return readInt(result, 'NewTotalAssociations')
  }

  /**
   * @param index between 0 and [[getTotalAssociations]] - 1
   */
  async getGenericAssociatedDeviceInfo(
    index: number,
    wifiInterfaceId = 1,
    timeout?: number
  ): Promise<WifiDeviceInfo> {
    const result = await this.wifiAction(
      'getGenericAssociatedDeviceInfo',
      wifiInterfaceId,
      'GetGenericAssociatedDeviceInfo',
      { NewAssociatedDeviceIndex: index },
      timeout
    )
    return toWifiDeviceInfo(result)
  }

  async getSpecificAssociatedDeviceInfo(
    macAddress: string,
    wifiInterfaceId = 1,
    timeout?: number
  ): Promise<WifiDeviceInfo> {
    const result = await this.wifiAction(
      'getSpecificAssociatedDeviceInfo',
      wifiInterfaceId,
      'GetSpecificAssociatedDeviceInfo',
      { NewAssociatedDeviceMACAddress: macAddress },
      timeout
    )
    return toWifiDeviceInfo(result, macAddress)
  }

  async setEnable(status: boolean, wifiInterfaceId = 1, timeout?: number) {
    await this.wifiAction(
      'setEnable',
      wifiInterfaceId,
      'SetEnable',
      { NewEnable: flag(status) },
      timeout
    )
  }

  async setChannel(channel: number, wifiInterfaceId = 1, timeout?: number) {
    await this.wifiAction(
      'setChannel',
      wifiInterfaceId,
      'SetChannel',
      { NewChannel: channel },
      timeout
    )
  }

  async setSSID(ssid: string, wifiInterfaceId = 1, timeout?: number) {
    await this.wifiAction(
      'setSSID',
      wifiInterfaceId,
      'SetSSID',
      { NewSSID: ssid },
      timeout
    )
  }
}
