import Debug from 'debug'
import { DeviceTR64 } from '../device'
import { requestXml } from '../request'
import { readBool, readString } from '../result'
import { findServiceType, flag } from './lookup'
import type { ServiceTypeLookup } from './lookup'

const debug = Debug('tr64:actions:fritz')

type FritzMethod =
  | 'sendWakeOnLan'
  | 'doUpdate'
  | 'isOptimizedForIPTV'
  | 'setOptimizedForIPTV'
  | 'getCallList'

export interface UpdateInfo {
  readonly upgradeAvailable: boolean
  /** e.g. Started, Stopped or Error */
  readonly updateState: string
}

/**
 * a single entry of the call list. Known keys are Id, Type (1 answered,
 * 2 missed, 3 outgoing), Caller, Called, CalledNumber, Name, Numbertype,
 * Device, Port, Date, Duration, Count and Path.
 */
export type Call = Readonly<Record<string, string>>

/**
 * actions only AVM Fritz!Box devices support
 */
export class Fritz extends DeviceTR64 {
  static readonly serviceTypeLookup: ServiceTypeLookup<FritzMethod> = {
    sendWakeOnLan: 'urn:dslforum-org:service:Hosts:',
    doUpdate: 'urn:dslforum-org:service:UserInterface:1',
    isOptimizedForIPTV: 'urn:dslforum-org:service:WLANConfiguration:',
    setOptimizedForIPTV: 'urn:dslforum-org:service:WLANConfiguration:',
    getCallList: 'urn:dslforum-org:service:X_AVM-DE_OnTel:1',
  }

  static getServiceType(method: string): string | undefined {
    return findServiceType(Fritz.serviceTypeLookup, method)
  }

  /**
   * wakes up a host of the lan
   *
   * @param macAddress may be case sensitive, depending on the device
   */
  async sendWakeOnLan(
    macAddress: string,
    lanInterfaceId = 1,
    timeout = 1000
  ): Promise<void> {
    await this.executeAction(
      Fritz.serviceTypeLookup.sendWakeOnLan + lanInterfaceId,
      'X_AVM-DE_WakeOnLANByMACAddress',
      { NewMACAddress: macAddress },
      timeout
    )
  }

  /** starts a firmware update if one is available */
  async doUpdate(timeout = 1000): Promise<UpdateInfo> {
    const result = await this.executeAction(
      Fritz.serviceTypeLookup.doUpdate,
      'X_AVM-DE_DoUpdate',
      {},
      timeout
    )
    return {
      upgradeAvailable: readBool(result, 'NewUpgradeAvailable'),
      updateState: readString(result, 'NewX_AVM-DE_UpdateState'),
    }
  }

  async isOptimizedForIPTV(
    wifiInterfaceId = 1,
    timeout = 1000
  ): Promise<boolean> {
    const result = await this.executeAction(
      Fritz.serviceTypeLookup.isOptimizedForIPTV + wifiInterfaceId,
      'X_AVM-DE_GetIPTVOptimized',
      {},
      timeout
    )
    return readBool(result, 'NewX_AVM-DE_IPTVoptimize')
  }

  async setOptimizedForIPTV(
    status: boolean,
    wifiInterfaceId = 1,
    timeout = 1000
  ): Promise<void> {
    await this.executeAction(
      Fritz.serviceTypeLookup.setOptimizedForIPTV + wifiInterfaceId,
      'X_AVM-DE_SetIPTVOptimized',
      { 'NewX_AVM-DE_IPTVoptimize': flag(status) },
      timeout
    )
  }

  /**
   * requests the url of the call list and loads the calls from there
   */
  async getCallList(timeout = 1000): Promise<Call[]> {
    const result = await this.executeAction(
      Fritz.serviceTypeLookup.getCallList,
      'GetCallList',
      {},
      timeout
    )
    const url = readString(result, 'NewCallListURL')
    debug('Loading call list from', url)
    const root = await requestXml(
      this.requestOptions(url, timeout, false),
      `Could not get call list "${url}"`
    )
    return root.children
      .filter(child => child.name.toLowerCase() === 'call')
      .map(call => {
        const entry: Record<string, string> = {}
        call.children.forEach(parameter => {
          entry[parameter.name] = parameter.text
        })
        return entry
      })
  }
}
