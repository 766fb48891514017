import { DeviceTR64 } from '../device'
import { readBool, readInt, readString } from '../result'
import type { ActionResult } from '../soap'
import { findServiceType } from './lookup'
import type { ServiceTypeLookup } from './lookup'

type SystemMethod =
  | 'getSystemInfo'
  | 'reboot'
  | 'getTimeInfo'
  | 'softwareUpdateAvailable'

export interface SystemInfo {
  readonly manufactureName: string
  readonly modelName: string
  readonly description: string
  readonly serialNumber: string
  readonly softwareVersion: string
  readonly hwVersion: string
  /** seconds since the last boot */
  readonly uptime: number
  readonly log: string
  readonly raw: ActionResult
}

export interface TimeInfo {
  readonly ntpServer1: string
  readonly ntpServer2: string
  readonly currentLocalTime: string
  readonly localTimeZone: string
  readonly localTimeZoneName: string
  readonly isDaylightSaving: boolean
  readonly daylightSavingStart: string
  readonly daylightSavingEnd: string
  readonly raw: ActionResult
}

export const toSystemInfo = (raw: ActionResult): SystemInfo => ({
  manufactureName: readString(raw, 'NewManufacturerName'),
  modelName: readString(raw, 'NewModelName'),
  description: readString(raw, 'NewDescription'),
  serialNumber: readString(raw, 'NewSerialNumber'),
  softwareVersion: readString(raw, 'NewSoftwareVersion'),
  hwVersion: readString(raw, 'NewHardwareVersion'),
  uptime: readInt(raw, 'NewUpTime'),
  log: readString(raw, 'NewDeviceLog'),
  raw,
})

export const toTimeInfo = (raw: ActionResult): TimeInfo => ({
  ntpServer1: readString(raw, 'NewNTPServer1'),
  ntpServer2: readString(raw, 'NewNTPServer2'),
  currentLocalTime: readString(raw, 'NewCurrentLocalTime'),
  localTimeZone: readString(raw, 'NewLocalTimeZone'),
  localTimeZoneName: readString(raw, 'NewLocalTimeZoneName'),
  isDaylightSaving: readBool(raw, 'NewDaylightSavingsUsed'),
  daylightSavingStart: readString(raw, 'NewDaylightSavingsStart'),
  daylightSavingEnd: readString(raw, 'NewDaylightSavingsEnd'),
  raw,
})

/**
 * system information and control of a device supporting
 * `urn:dslforum-org:service:DeviceInfo:1`, `urn:dslforum-org:service:DeviceConfig:1`,
 * `urn:dslforum-org:service:Time:1` and `urn:dslforum-org:service:UserInterface:1`
 */
export class System extends DeviceTR64 {
  static readonly serviceTypeLookup: ServiceTypeLookup<SystemMethod> = {
    getSystemInfo: 'urn:dslforum-org:service:DeviceInfo:1',
    reboot: 'urn:dslforum-org:service:DeviceConfig:1',
    getTimeInfo: 'urn:dslforum-org:service:Time:1',
    softwareUpdateAvailable: 'urn:dslforum-org:service:UserInterface:1',
  }

  static getServiceType(method: string): string | undefined {
    return findServiceType(System.serviceTypeLookup, method)
  }

  async getSystemInfo(timeout = 1000): Promise<SystemInfo> {
    const result = await this.executeAction(
      System.serviceTypeLookup.getSystemInfo,
      'GetInfo',
      {},
      timeout
    )
    return toSystemInfo(result)
  }

  async reboot(timeout = 1000): Promise<void> {
    await this.executeAction(
      System.serviceTypeLookup.reboot,
      'Reboot',
      {},
      timeout
    )
  }

  async getTimeInfo(timeout = 1000): Promise<TimeInfo> {
    const result = await this.executeAction(
      System.serviceTypeLookup.getTimeInfo,
      'GetInfo',
      {},
      timeout
    )
    return toTimeInfo(result)
  }

  async softwareUpdateAvailable(timeout = 1000): Promise<boolean> {
    const result = await this.executeAction(
      System.serviceTypeLookup.softwareUpdateAvailable,
      'GetInfo',
      {},
      timeout
    )
    return readBool(result, 'NewUpgradeAvailable')
  }
}
