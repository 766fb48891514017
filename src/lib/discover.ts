import { createSocket } from 'dgram'
import type { RemoteInfo } from 'dgram'
import Debug from 'debug'
import { lookup } from 'dns/promises'
import { defaults } from 'underscore'
import { URL } from 'url'
import { USER_AGENT } from './device'
import { TR64Error, TR64ErrorCode } from './errors'
import { requestXml } from './request'
import { walk } from './xml'

const debug = Debug('tr64:discover')

/**
 * the part of a udp socket discovery needs, `dgram.Socket` satisfies it
 */
export interface SsdpSocket {
  bind(callback: () => void): unknown
  setMulticastTTL(ttl: number): unknown
  send(
    message: Buffer,
    port: number,
    address: string,
    callback: (error: Error | null) => void
  ): void
  on(
    event: 'message',
    listener: (message: Buffer, remote: RemoteInfo) => void
  ): unknown
  on(event: 'error', listener: (error: Error) => void): unknown
  close(): unknown
}

export interface DiscoverOptions {
  /** one or more service types to search for */
  service: string | readonly string[]
  /** milliseconds without a response until a search ends */
  timeout: number
  retries: number
  ipAddress: string
  port: number
  socketFactory: () => SsdpSocket
}

export interface DiscoverHostOptions extends DiscoverOptions {
  /** skips the broad discovery, the result is searched at this location */
  deviceDefinitionURL?: string
  proxy?: string
}

const DEFAULTS: DiscoverOptions = {
  service: 'ssdp:all',
  timeout: 1000,
  retries: 2,
  ipAddress: '239.255.255.250',
  port: 1900,
  socketFactory: () => createSocket({ type: 'udp4', reuseAddr: true }),
}

const MULTICAST_TTL = 2

/**
 * a single answer to a search request
 */
export class DiscoveryResponse {
  readonly locationProtocol: string
  readonly locationHost: string
  readonly locationPort: number
  readonly locationPath: string

  constructor(
    readonly location: string,
    /** the announced service type (ST) */
    readonly service: string,
    readonly usn: string,
    readonly headers: Readonly<Record<string, string>> = {}
  ) {
    let url: URL
    try {
      url = new URL(location)
    } catch (error) {
      throw new TR64Error(
        TR64ErrorCode.InvalidArgument,
        `Invalid location: ${location}`,
        { cause: error }
      )
    }
    this.locationProtocol = url.protocol.replace(/:$/, '').toLowerCase()
    this.locationHost = url.hostname
    this.locationPort = url.port
      ? parseInt(url.port, 10)
      : this.locationProtocol === 'https'
      ? 443
      : 80
    this.locationPath = url.pathname
  }

  static create(location: string, service = 'uuid:none', usn = 'none') {
    return new DiscoveryResponse(location, service, usn, {
      location,
      st: service,
      usn,
    })
  }

  /**
   * reads a datagram as http response, header names are case insensitive
   */
  static parse(datagram: string): DiscoveryResponse {
    const [statusLine, ...lines] = datagram.split(/\r?\n/)
    if (!/^HTTP\/\d\.\d \d{3}/.test(statusLine)) {
      throw new TR64Error(
        TR64ErrorCode.UnexpectedResponse,
        `Not a http response: ${statusLine}`
      )
    }
    const headers: Record<string, string> = {}
    for (const line of lines) {
      const separator = line.indexOf(':')
      if (separator > 0) {
        const name = line.slice(0, separator).trim().toLowerCase()
        headers[name] = line.slice(separator + 1).trim()
      }
    }
    if (!headers.location) {
      throw new TR64Error(
        TR64ErrorCode.UnexpectedResponse,
        'Discovery response contains no location'
      )
    }
    return new DiscoveryResponse(
      headers.location,
      headers.st ?? '',
      headers.usn ?? '',
      headers
    )
  }
}

const RATINGS: ReadonlyArray<[string, number]> = [
  ['urn:dslforum-org:device', 11],
  ['urn:dslforum-org:service', 10],
  ['urn:dslforum-org:', 9],
  ['urn:schemas-upnp-org:device', 8],
  ['urn:schemas-upnp-org:service', 7],
  ['urn:schemas-upnp-org:', 6],
  ['urn:schemas-', 5],
  ['urn:', 4],
  ['upnp:rootdevice', 3],
  ['uuid:', 2],
]

/**
 * rates the service type of a response, the more specific the higher.
 * Devices usually answer a search with several service types.
 */
export function rateServiceTypeInResult(response?: DiscoveryResponse): number {
  if (!response) {
    return 0
  }
  const rating = RATINGS.find(([prefix]) => response.service.startsWith(prefix))
  return rating ? rating[1] : 1
}

export const searchMessage = (
  service: string,
  ipAddress: string,
  port: number
) =>
  'M-SEARCH * HTTP/1.1\r\n' +
  'MX: 5\r\n' +
  'MAN: "ssdp:discover"\r\n' +
  `HOST: ${ipAddress}:${port}\r\n` +
  `ST: ${service}\r\n\r\n`

function send(
  socket: SsdpSocket,
  message: Buffer,
  port: number,
  address: string
): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.send(message, port, address, error =>
      error ? reject(error) : resolve()
    )
  })
}

/**
 * one search on a fresh socket, every message is sent twice. Resolves after
 * `timeout` milliseconds without a response.
 */
function search(
  messages: readonly Buffer[],
  options: DiscoverOptions,
  responses: Map<string, DiscoveryResponse>
): Promise<void> {
  const socket = options.socketFactory()
  return new Promise<void>((resolve, reject) => {
    let timer: NodeJS.Timeout | undefined
    let done = false

    const finish = (error?: Error) => {
      if (done) {
        return
      }
      done = true
      clearTimeout(timer)
      socket.close()
      if (error) {
        reject(
          new TR64Error(
            TR64ErrorCode.Transport,
            `Discovery failed: ${error.message}`,
            { cause: error }
          )
        )
      } else {
        resolve()
      }
    }
    const restartTimer = () => {
      clearTimeout(timer)
      timer = setTimeout(() => finish(), options.timeout)
    }

    socket.on('message', (message, remote) => {
      try {
        const response = DiscoveryResponse.parse(message.toString('utf8'))
        debug(`Found ${response.service} at ${response.location}`)
        responses.set(response.location, response)
      } catch (error) {
        debug(`Skipping response of ${remote.address}`, error)
      }
      if (!done) {
        restartTimer()
      }
    })
    socket.on('error', error => finish(error))

    socket.bind(() => {
      try {
        socket.setMulticastTTL(MULTICAST_TTL)
      } catch (error) {
        finish(error instanceof Error ? error : new Error(String(error)))
        return
      }
      const sendAll = async () => {
        for (let round = 0; round < 2; round++) {
          for (const message of messages) {
            await send(socket, message, options.port, options.ipAddress)
          }
        }
      }
      sendAll().then(
        () => {
          if (!done) {
            restartTimer()
          }
        },
        error => finish(error)
      )
    })
  })
}

/**
 * discovers upnp devices in the local network. Searches can get lost, so
 * more than one retry is recommended.
 *
 * @example
 * ```
 * const results = await discover({ service: 'urn:dslforum-org:device:InternetGatewayDevice:1' })
 * results.forEach(result => console.log(result.locationHost, result.location))
 * ```
 */
export async function discover(
  options: Partial<DiscoverOptions> = {}
): Promise<DiscoveryResponse[]> {
  const config: DiscoverOptions = defaults({}, options, DEFAULTS)
  const services =
    typeof config.service === 'string' ? [config.service] : config.service
  const messages = services.map(service =>
    Buffer.from(searchMessage(service, config.ipAddress, config.port), 'utf8')
  )
  const responses = new Map<string, DiscoveryResponse>()
  for (let retry = 0; retry < config.retries; retry++) {
    debug(`Searching ${services.join(', ')}, try ${retry + 1}`)
    await search(messages, config, responses)
  }
  return Array.from(responses.values())
}

const pickBest = (
  responses: readonly DiscoveryResponse[],
  addresses: readonly string[]
) =>
  responses
    .filter(response => addresses.includes(response.locationHost))
    .reduce<DiscoveryResponse | undefined>(
      (best, response) =>
        rateServiceTypeInResult(response) > rateServiceTypeInResult(best)
          ? response
          : best,
      undefined
    )

const dslforumVariant = (service: string) =>
  service.replace('schemas-upnp-org', 'dslforum-org')

/**
 * finds the most specific discovery result of a host. The result contains
 * the location of the device description. This call is expensive, its
 * result should be cached.
 */
export async function discoverParticularHost(
  host: string,
  options: Partial<DiscoverHostOptions> = {}
): Promise<DiscoveryResponse | undefined> {
  const config: DiscoverHostOptions = defaults({}, options, DEFAULTS)
  let addresses: string[]
  try {
    const entries = await lookup(host, { all: true })
    addresses = entries.map(entry => entry.address)
  } catch (error) {
    throw new TR64Error(
      TR64ErrorCode.Transport,
      `Could not resolve host "${host}"`,
      { cause: error }
    )
  }
  if (addresses.length === 0) {
    return undefined
  }
  debug(`Discovering ${host} at ${addresses.join(', ')}`)

  const services: string[] = []
  let bestPick: DiscoveryResponse | undefined
  if (config.deviceDefinitionURL === undefined) {
    const results = await discover(config)
    bestPick = pickBest(results, addresses)
    results
      .filter(result => addresses.includes(result.locationHost))
      .forEach(result => {
        if (!services.includes(result.service)) {
          services.push(result.service)
        }
      })
    if (!bestPick) {
      return undefined
    }
  } else {
    bestPick = DiscoveryResponse.create(
      config.deviceDefinitionURL,
      typeof config.service === 'string' ? config.service : undefined
    )
  }

  const root = await requestXml(
    {
      uri: bestPick.location,
      timeout: config.timeout,
      proxy: config.proxy || false,
      headers: { 'User-Agent': USER_AGENT },
    },
    `Could not get CPE definitions for "${bestPick.location}"`
  )
  for (const element of walk(root)) {
    if (!element.name.toLowerCase().endsWith('devicetype')) {
      continue
    }
    const deviceType = element.text
    if (!services.includes(deviceType)) {
      services.push(deviceType)
    }
    if (dslforumVariant(deviceType) === bestPick.service) {
      return bestPick
    }
    services.slice().forEach(service => {
      const variant = dslforumVariant(service)
      if (!services.includes(variant)) {
        services.push(variant)
      }
    })
    const specific = await discover({ ...config, service: services })
    const evenBetterPick = pickBest(specific, addresses)
    if (evenBetterPick) {
      return evenBetterPick
    }
    break
  }
  return config.deviceDefinitionURL === undefined ? bestPick : undefined
}
