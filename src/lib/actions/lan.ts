import Debug from 'debug'
import { lastValueFrom, range } from 'rxjs'
import { concatMap, toArray } from 'rxjs/operators'
import { DeviceTR64 } from '../device'
import { readBool, readInt, readString } from '../result'
import type { ActionResult } from '../soap'
import { findServiceType, flag } from './lookup'
import type { ServiceTypeLookup } from './lookup'

const debug = Debug('tr64:actions:lan')

type LanMethod =
  | 'getAmountOfHostsConnected'
  | 'getHostDetailsByIndex'
  | 'getHostDetailsByMACAddress'
  | 'getEthernetInfo'
  | 'getEthernetStatistic'
  | 'setEnable'

export interface HostDetails {
  readonly macAddress: string
  readonly ipAddress: string
  readonly hostname: string
  /** e.g. Ethernet or 802.11 */
  readonly interface: string
  /** how the address was assigned, e.g. DHCP */
  readonly source: string
  /** remaining lease time in seconds */
  readonly leasetime: number
  readonly active: boolean
  readonly raw: ActionResult
}

export interface EthernetInfo {
  readonly enabled: boolean
  readonly status: string
  readonly macAddress: string
  readonly maxBitRate: string
  readonly duplexMode: string
  readonly raw: ActionResult
}

export interface EthernetStatistic {
  readonly bytesSent: number
  readonly bytesReceived: number
  readonly packetsSent: number
  readonly packetsReceived: number
  readonly raw: ActionResult
}

/**
 * @param macAddress takes precedence over the address in the result
 */
export const toHostDetails = (
  raw: ActionResult,
  macAddress?: string
): HostDetails => ({
  macAddress: macAddress ?? readString(raw, 'NewMACAddress'),
  ipAddress: readString(raw, 'NewIPAddress'),
  hostname: readString(raw, 'NewHostName'),
  interface: readString(raw, 'NewInterfaceType'),
  source: readString(raw, 'NewAddressSource'),
  leasetime: readInt(raw, 'NewLeaseTimeRemaining'),
  active: readBool(raw, 'NewActive'),
  raw,
})

export const toEthernetInfo = (raw: ActionResult): EthernetInfo => ({
  enabled: readBool(raw, 'NewEnable'),
  status: readString(raw, 'NewStatus'),
  macAddress: readString(raw, 'NewMACAddress'),
  maxBitRate: readString(raw, 'NewMaxBitRate'),
  duplexMode: readString(raw, 'NewDuplexMode'),
  raw,
})

export const toEthernetStatistic = (raw: ActionResult): EthernetStatistic => ({
  bytesSent: readInt(raw, 'NewBytesSent'),
  bytesReceived: readInt(raw, 'NewBytesReceived'),
  packetsSent: readInt(raw, 'NewPacketsSent'),
  packetsReceived: readInt(raw, 'NewPacketsReceived'),
  raw,
})

/**
 * LAN information of a device supporting `urn:dslforum-org:service:Hosts:1`
 * and `urn:dslforum-org:service:LANEthernetInterfaceConfig:1`.
 *
 * The device description has to be loaded first, for a Fritz!Box
 * [[DeviceTR64.setupTR64Device]] can be used instead. Depending on the device
 * interface ids start with 0 or 1.
 */
export class Lan extends DeviceTR64 {
  static readonly serviceTypeLookup: ServiceTypeLookup<LanMethod> = {
    getAmountOfHostsConnected: 'urn:dslforum-org:service:Hosts:',
    getHostDetailsByIndex: 'urn:dslforum-org:service:Hosts:',
    getHostDetailsByMACAddress: 'urn:dslforum-org:service:Hosts:',
    getEthernetInfo: 'urn:dslforum-org:service:LANEthernetInterfaceConfig:',
    getEthernetStatistic: 'urn:dslforum-org:service:LANEthernetInterfaceConfig:',
    setEnable: 'urn:dslforum-org:service:LANEthernetInterfaceConfig:',
  }

  /** the service type (prefix) a method is executed on */
  static getServiceType(method: string): string | undefined {
    return findServiceType(Lan.serviceTypeLookup, method)
  }

  protected lanAction(
    method: LanMethod,
    lanInterfaceId: number,
    action: string,
    args: Record<string, string | number> = {},
    timeout = 1000
  ) {
    const serviceType = Lan.serviceTypeLookup[method] + lanInterfaceId
    return this.executeAction(serviceType, action, args, timeout)
  }

  /**
   * the amount of hosts the device knows, connected or not
   */
  async getAmountOfHostsConnected(lanInterfaceId = 1, timeout?: number) {
    const result = await this.lanAction(
      'getAmountOfHostsConnected',
      lanInterfaceId,
      'GetHostNumberOfEntries',
      {},
      timeout
    )
    return readInt(result, 'NewHostNumberOfEntries')
  }

  /**
   * @param index between 0 and [[getAmountOfHostsConnected]] - 1
   */
  async getHostDetailsByIndex(
    index: number,
    lanInterfaceId = 1,
    timeout?: number
  ): Promise<HostDetails> {
    const result = await this.lanAction(
      'getHostDetailsByIndex',
      lanInterfaceId,
      'GetGenericHostEntry',
      { NewIndex: index },
      timeout
    )
    return toHostDetails(result)
  }

  /**
   * @param macAddress may be case sensitive, depending on the device
   */
  async getHostDetailsByMACAddress(
    macAddress: string,
    lanInterfaceId = 1,
    timeout?: number
  ): Promise<HostDetails> {
    const result = await this.lanAction(
      'getHostDetailsByMACAddress',
      lanInterfaceId,
      'GetSpecificHostEntry',
      { NewMACAddress: macAddress },
      timeout
    )
    return toHostDetails(result, macAddress)
  }

  /**
   * the details of all hosts the device knows, requested one after another
   */
  async getAllHostDetails(
    lanInterfaceId = 1,
    timeout?: number
  ): Promise<HostDetails[]> {
    const amount = await this.getAmountOfHostsConnected(lanInterfaceId, timeout)
    debug(`Requesting ${amount} hosts`)
    return lastValueFrom(
      range(0, amount).pipe(
        concatMap(index =>
          this.getHostDetailsByIndex(index, lanInterfaceId, timeout)
        ),
        toArray()
      )
    )
  }

  async getEthernetInfo(
    lanInterfaceId = 1,
    timeout?: number
  ): Promise<EthernetInfo> {
    const result = await this.lanAction(
      'getEthernetInfo',
      lanInterfaceId,
      'GetInfo',
      {},
      timeout
    )
    return toEthernetInfo(result)
  }

  async getEthernetStatistic(
    lanInterfaceId = 1,
    timeout?: number
  ): Promise<EthernetStatistic> {
    const result = await this.lanAction(
      'getEthernetStatistic',
      lanInterfaceId,
      'GetStatistics',
      {},
      timeout
    )
    return toEthernetStatistic(result)
  }

  async setEnable(
    status: boolean,
    lanInterfaceId = 1,
    timeout?: number
  ): Promise<void> {
    await this.lanAction(
      'setEnable',
      lanInterfaceId,
      'SetEnable',
      { NewEnable: flag(status) },
      timeout
    )
  }
}
