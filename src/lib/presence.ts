import Debug from 'debug'
import { z } from 'zod'
import type { Lan } from './actions/lan'
import { TR64Error, TR64ErrorCode, UPNP_NO_SUCH_ENTRY, isTR64Error } from './errors'

const debug = Debug('tr64:presence')

export const personalDeviceConfigSchema = z.object({
  type_name: z.string(),
  mac: z.string(),
  name: z.string().optional(),
})

export type PersonalDeviceConfig = z.infer<typeof personalDeviceConfigSchema>

export const personConfigSchema = z.object({
  name: z.string(),
  devices: z.array(personalDeviceConfigSchema).default([]),
})

export type PersonConfig = z.infer<typeof personConfigSchema>

export const presenceConfigSchema = z.object({
  persons: z.array(personConfigSchema).default([]),
})

export type PresenceConfig = z.infer<typeof presenceConfigSchema>

/**
 * a device whose activity tells whether its owner is present
 */
export abstract class PersonalDevice {
  abstract readonly typeName: string

  protected deviceName: string
  protected isActive = false

  constructor(name = 'Unspecific device') {
    this.deviceName = name
  }

  get name(): string {
    return this.deviceName
  }

  get active(): boolean {
    return this.isActive
  }

  /** refreshes name and activity from the data source */
  abstract update(): Promise<void>

  abstract toConfig(): PersonalDeviceConfig
}

/**
 * a host known to the lan of a Fritz!Box, identified by its mac address
 */
export class FritzBoxHost extends PersonalDevice {
  static readonly typeName = 'fritz_box_host'

  readonly typeName = FritzBoxHost.typeName
  ipAddress?: string

  constructor(
    private readonly lan: Lan,
    readonly mac: string,
    name = 'Fritz!Box device'
  ) {
    super(name)
  }

  /**
   * hosts the router does not know (anymore) keep their last state, so do
   * all hosts while the router is unreachable
   */
  async update(): Promise<void> {
    try {
      const host = await this.lan.getHostDetailsByMACAddress(this.mac)
      this.ipAddress = host.ipAddress
      this.deviceName = host.hostname
      this.isActive = host.active
    } catch (error) {
      if (!isTR64Error(error)) {
        throw error
      }
      if (error.upnpErrorCode === UPNP_NO_SUCH_ENTRY) {
        debug(`Host ${this.mac} is unknown to the router`)
        return
      }
      if (error.code === TR64ErrorCode.Transport) {
        debug(`Could not update host ${this.mac}`, error.message)
        return
      }
      throw error
    }
  }

  toConfig(): PersonalDeviceConfig {
    return { type_name: this.typeName, mac: this.mac, name: this.deviceName }
  }
}

type DeviceFactory = (config: PersonalDeviceConfig, lan: Lan) => PersonalDevice

const DEVICE_TYPES: Readonly<Record<string, DeviceFactory>> = {
  [FritzBoxHost.typeName]: (config, lan) =>
    new FritzBoxHost(lan, config.mac, config.name),
}

export const createPersonalDevice = (
  config: PersonalDeviceConfig,
  lan: Lan
): PersonalDevice => {
  const factory = Object.prototype.hasOwnProperty.call(
    DEVICE_TYPES,
    config.type_name
  )
    ? DEVICE_TYPES[config.type_name]
    : undefined
  if (!factory) {
    throw new TR64Error(
      TR64ErrorCode.InvalidArgument,
      `Failed to load personal device type: ${config.type_name}`
    )
  }
  return factory(config, lan)
}

export class Person {
  readonly devices: PersonalDevice[] = []

  private isPresent = false
  private updated?: Date
  private changed?: Date

  constructor(readonly name: string) {}

  get present(): boolean {
    return this.isPresent
  }

  /** time of the last presence update */
  get presenceUpdated(): Date | undefined {
    return this.updated
  }

  /** time of the last presence flip */
  get presenceChanged(): Date | undefined {
    return this.changed
  }

  addDevice(device: PersonalDevice) {
    this.devices.push(device)
  }

  /**
   * updates all devices, a person is present as long as one of them is
   * active. Persons without devices are left untouched.
   */
  async updatePresence(now = new Date()): Promise<void> {
    if (this.devices.length === 0) {
      debug(`${this.name} has no devices, presence not updated`)
      return
    }
    for (const device of this.devices) {
      await device.update()
    }
    const present = this.devices.some(device => device.active)
    this.updated = now
    if (present !== this.isPresent) {
      debug(`${this.name} is ${present ? 'present' : 'away'}`)
      this.changed = now
    }
    this.isPresent = present
  }

  toConfig(): PersonConfig {
    return {
      name: this.name,
      devices: this.devices.map(device => device.toConfig()),
    }
  }
}

/**
 * detects the presence of persons by the activity of their devices
 *
 * @example
 * ```
 * const presence = Presence.fromConfig(
 *   { persons: [{ name: 'Alex', devices: [{ type_name: 'fritz_box_host', mac: '00:11:22:33:44:55' }] }] },
 *   lan
 * )
 * await presence.update()
 * ```
 */
export class Presence {
  readonly persons: Person[] = []

  /**
   * builds persons and devices of a stored configuration
   */
  static fromConfig(config: unknown, lan: Lan): Presence {
    const parsed = presenceConfigSchema.safeParse(config)
    if (!parsed.success) {
      throw new TR64Error(
        TR64ErrorCode.InvalidArgument,
        `Invalid presence configuration: ${parsed.error.message}`,
        { cause: parsed.error }
      )
    }
    const presence = new Presence()
    parsed.data.persons.forEach(personConfig => {
      const person = new Person(personConfig.name)
      personConfig.devices.forEach(deviceConfig =>
        person.addDevice(createPersonalDevice(deviceConfig, lan))
      )
      presence.addPerson(person)
    })
    return presence
  }

  addPerson(person: Person) {
    this.persons.push(person)
  }

  async update(): Promise<void> {
    for (const person of this.persons) {
      await person.updatePresence()
    }
  }

  toConfig(): PresenceConfig {
    return { persons: this.persons.map(person => person.toConfig()) }
  }
}
