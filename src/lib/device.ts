import Debug from 'debug'
import { Observable } from 'rxjs'
import { map, share } from 'rxjs/operators'
import { defaults } from 'underscore'
import { URL } from 'url'
import { parseDeviceDescription } from './description'
import type { DeviceInformation, ServiceDefinition } from './description'
import { TR64Error, TR64ErrorCode } from './errors'
import type { EventServer } from './eventserver'
import type {
  DeviceEvent,
  DeviceTR64Options,
  ServiceSummary,
  SubscriptionResult,
} from './model'
import fritzboxPreset from './presets/fritzbox.json'
import { request, requestXml } from './request'
import type { RequestOptions } from './request'
import { parseSCPD } from './scpd'
import type { ServiceSCPD } from './scpd'
import { buildSoapMessage, parseSoapResponse } from './soap'
import type { ActionArguments, ActionResult } from './soap'
import { parseXml } from './xml'

const debug = Debug('tr64:device')

/** some devices answer differently without a user agent */
export const USER_AGENT = 'Mozilla/5.0; tr64-upnp'

/** a subscription is renewed every 30 minutes */
export const SUBSCRIPTION_RENEWAL = 1800000

const DEFAULTS: DeviceTR64Options = {
  host: 'fritz.box',
  port: 49000,
  protocol: 'http',
  username: undefined,
  password: undefined,
  httpProxy: undefined,
  httpsProxy: undefined,
  rejectUnauthorized: false,
}

export interface LoadSCPDOptions {
  timeout?: number
  /** stores the error at the service definition and continues with the next service */
  ignoreFailures?: boolean
}

interface Subscription {
  sid: string
  timer: NodeJS.Timeout
}

type URLKind = 'controlURL' | 'scpdURL' | 'eventSubURL'

/**
 * a TR-064 capable device. Loads the description of its services and their
 * actions and executes actions via soap.
 *
 * @example
 * ```
 * const device = new DeviceTR64({ host: 'fritz.box', username: 'admin', password: 'secret' })
 * await device.loadDeviceDefinitions('http://fritz.box:49000/tr64desc.xml')
 * const info = await device.execute('/upnp/control/deviceinfo', 'urn:dslforum-org:service:DeviceInfo:1', 'GetInfo')
 * ```
 */
export class DeviceTR64 {
  protected readonly options: DeviceTR64Options

  protected definitions = new Map<string, ServiceDefinition>()
  protected information: DeviceInformation = {}
  protected unknownKeys: Record<string, string> = {}
  protected scpd = new Map<string, ServiceSCPD>()
  protected subscriptions = new Map<string, Subscription>()

  /** true once a device description has been loaded */
  protected initialized = false

  constructor(options?: Partial<DeviceTR64Options>) {
    this.options = defaults({}, options, DEFAULTS)
    debug('Options set', this.options.protocol, this.options.host, this.options.port)
  }

  /**
   * creates a device from the url of its description, the port defaults to
   * the default of the protocol
   */
  static createFromURL<T extends DeviceTR64>(
    this: new (options?: Partial<DeviceTR64Options>) => T,
    urlOfXMLDefinition: string,
    options: Partial<DeviceTR64Options> = {}
  ): T {
    const url = new URL(urlOfXMLDefinition)
    const protocol = url.protocol.replace(/:$/, '').toLowerCase()
    if (protocol !== 'http' && protocol !== 'https') {
      throw new TR64Error(
        TR64ErrorCode.InvalidArgument,
        `Unsupported protocol: ${url.protocol}`
      )
    }
    const port = url.port
      ? parseInt(url.port, 10)
      : protocol === 'https'
      ? 443
      : 80
    return new this({ ...options, host: url.hostname, port, protocol })
  }

  get host(): string {
    return this.options.host
  }

  get port(): number {
    return this.options.port
  }

  get protocol(): string {
    return this.options.protocol
  }

  get username(): string | undefined {
    return this.options.username
  }

  get deviceServiceDefinitions(): ReadonlyMap<string, ServiceDefinition> {
    return this.definitions
  }

  get deviceInformation(): Readonly<DeviceInformation> {
    return this.information
  }

  get deviceUnknownKeys(): Readonly<Record<string, string>> {
    return this.unknownKeys
  }

  get deviceSCPD(): ReadonlyMap<string, ServiceSCPD> {
    return this.scpd
  }

  get baseURL(): string {
    return `${this.options.protocol}://${this.options.host}:${this.options.port}`
  }

  /**
   * installs the well known services of a device type without loading its
   * description. Only `fritz.box` is known.
   */
  setupTR64Device(deviceType: string) {
    if (deviceType.toLowerCase() !== 'fritz.box') {
      throw new TR64Error(
        TR64ErrorCode.InvalidArgument,
        `Unknown device type given: ${deviceType}`
      )
    }
    const definitions = new Map<string, ServiceDefinition>()
    Object.entries(fritzboxPreset.controlURLs).forEach(([type, controlURL]) => {
      definitions.set(fritzboxPreset.serviceTypePrefix + type, { controlURL })
    })
    this.definitions = definitions
    this.scpd = new Map()
    this.initialized = false
  }

  protected resolveURL(uri: string): string {
    return uri.startsWith('http') ? uri : this.baseURL + uri
  }

  protected proxyFor(url: string): string | false {
    const proxy = url.startsWith('https')
      ? this.options.httpsProxy
      : this.options.httpProxy
    return proxy || false
  }

  /**
   * the options every request to the device is sent with
   */
  protected requestOptions(
    uri: string,
    timeout: number,
    authenticate = true
  ): RequestOptions {
    const options: RequestOptions = {
      uri,
      timeout,
      proxy: this.proxyFor(uri),
      rejectUnauthorized: this.options.rejectUnauthorized,
      headers: { 'User-Agent': USER_AGENT },
    }
    if (authenticate && this.options.password) {
      options.auth = {
        user: this.options.username ?? '',
        pass: this.options.password,
        sendImmediately: false,
      }
    }
    return options
  }

  /**
   * loads the root description of the device (e.g. /tr64desc.xml) and replaces
   * all service definitions, device information and scpd data loaded before.
   * Nothing is replaced if loading fails.
   */
  async loadDeviceDefinitions(
    urlOfXMLDefinition: string,
    timeout = 3000
  ): Promise<void> {
    const root = await requestXml(
      this.requestOptions(urlOfXMLDefinition, timeout, false),
      `Could not get CPE definitions "${urlOfXMLDefinition}"`
    )
    const description = parseDeviceDescription(urlOfXMLDefinition, root)
    debug(
      `Loaded ${description.definitions.size} services from ${urlOfXMLDefinition}`
    )
    this.definitions = description.definitions
    this.information = description.information
    this.unknownKeys = description.unknownKeys
    this.scpd = new Map()
    this.initialized = true
  }

  /**
   * loads the actions and state variables of a single service or, without
   * service type, of all known services
   */
  async loadSCPD(
    serviceType?: string,
    { timeout = 3000, ignoreFailures = false }: LoadSCPDOptions = {}
  ): Promise<void> {
    if (serviceType !== undefined) {
      return this.loadServiceSCPD(serviceType, timeout)
    }
    this.scpd = new Map()
    for (const [type, definition] of this.definitions) {
      delete definition.error
      try {
        await this.loadServiceSCPD(type, timeout)
      } catch (error) {
        if (!ignoreFailures || !(error instanceof TR64Error)) {
          throw error
        }
        debug(`Ignoring failed scpd of ${type}`, error.message)
        definition.error = error.message
      }
    }
  }

  protected async loadServiceSCPD(serviceType: string, timeout: number) {
    const definition = this.definitions.get(serviceType)
    if (!definition) {
      throw new TR64Error(
        TR64ErrorCode.UnknownService,
        `Can not load SCPD, no service type defined for: ${serviceType}`
      )
    }
    if (!definition.scpdURL) {
      throw new TR64Error(
        TR64ErrorCode.InvalidDefinition,
        `No SCPD URL defined for: ${serviceType}`
      )
    }
    this.scpd.delete(serviceType)

    const location = this.resolveURL(definition.scpdURL)
    const context = `Could not load SCPD for "${serviceType}" from ${location}`
    const response = await request(
      this.requestOptions(location, timeout),
      context
    )
    const body = typeof response.body === 'string' ? response.body : ''
    if (body.length === 0) {
      debug('Empty scpd for', serviceType)
      return
    }
    const root = await parseXml(
      body,
      `Can not parse SCPD content for "${serviceType}" from ${location}`
    )
    this.scpd.set(serviceType, parseSCPD(root))
  }

  protected lookupURL(
    serviceType: string,
    kind: URLKind,
    defaultValue?: string
  ): string {
    const definition = this.definitions.get(serviceType)
    if (definition) {
      const url = definition[kind]
      if (!url) {
        throw new TR64Error(
          TR64ErrorCode.InvalidDefinition,
          `No ${kind} defined for: ${serviceType}`
        )
      }
      return url
    }
    if (this.initialized || defaultValue === undefined) {
      throw new TR64Error(
        TR64ErrorCode.UnknownService,
        `Device do not support given serviceType: ${serviceType}`
      )
    }
    return defaultValue
  }

  /**
   * the control url of a service type. If no description has been loaded
   * the default is returned for unknown service types.
   */
  getControlURL(serviceType: string, defaultValue?: string): string {
    return this.lookupURL(serviceType, 'controlURL', defaultValue)
  }

  getSCPDURL(serviceType: string, defaultValue?: string): string {
    return this.lookupURL(serviceType, 'scpdURL', defaultValue)
  }

  getEventSubURL(serviceType: string, defaultValue?: string): string {
    return this.lookupURL(serviceType, 'eventSubURL', defaultValue)
  }

  /**
   * executes an action via soap and returns the direct children of the
   * response as flat map
   *
   * @param uri the control url, relative to the device or absolute
   * @param namespace the service type the action belongs to
   * @param timeout in milliseconds
   */
  async execute(
    uri: string,
    namespace: string,
    action: string,
    args: ActionArguments = {},
    timeout = 2000
  ): Promise<ActionResult> {
    if (!uri) {
      throw new TR64Error(
        TR64ErrorCode.InvalidArgument,
        'No action URI has been defined.'
      )
    }
    if (!namespace) {
      throw new TR64Error(
        TR64ErrorCode.InvalidArgument,
        'No namespace has been defined.'
      )
    }
    if (!action) {
      throw new TR64Error(
        TR64ErrorCode.InvalidArgument,
        'No action has been defined.'
      )
    }
    const body = buildSoapMessage(action, namespace, args)
    debug(`Executing ${namespace}#${action}`)

    const options = this.requestOptions(this.resolveURL(uri), timeout)
    const envelope = await requestXml(
      {
        ...options,
        method: 'POST',
        headers: {
          ...options.headers,
          'Content-Type': 'text/xml; charset="UTF-8"',
          SoapAction: `"${namespace}#${action}"`,
        },
        body,
      },
      `Could not execute "${action}${JSON.stringify(args)}"`
    )
    return parseSoapResponse(envelope, action)
  }

  /**
   * executes an action of a service type using its known control url
   */
  protected executeAction(
    serviceType: string,
    action: string,
    args: ActionArguments = {},
    timeout?: number
  ): Promise<ActionResult> {
    return this.execute(
      this.getControlURL(serviceType),
      serviceType,
      action,
      args,
      timeout
    )
  }

  /**
   * a short description of all known services with their actions and
   * evented variables, as far as their scpd has been loaded
   */
  describe(): ServiceSummary[] {
    return Array.from(this.definitions.entries()).map(([type, definition]) => {
      const scpd = this.scpd.get(type)
      const actions = scpd ? Array.from(scpd.actions.entries()) : []
      return {
        serviceType: type,
        ...definition,
        actions: actions.map(([name, spec]) => ({
          name,
          parameter: Object.keys(spec.inParameters),
          return: Object.keys(spec.outParameters),
        })),
        events: scpd ? scpd.eventedVariables : [],
      }
    })
  }

  /** service types sending events according to their scpd */
  get eventServiceTypes(): string[] {
    return Array.from(this.scpd.entries())
      .filter(([, scpd]) => scpd.eventedVariables.length > 0)
      .map(([type]) => type)
  }

  subscriptionActive(serviceType: string): boolean {
    return this.subscriptions.has(serviceType)
  }

  getServiceTypeBySid(sid: string): string | undefined {
    for (const [type, subscription] of this.subscriptions) {
      if (subscription.sid === sid) {
        return type
      }
    }
    return undefined
  }

  /**
   * sends the SUBSCRIBE request of a service and returns the sid the device
   * assigned
   */
  protected async sendSubscription(
    serviceType: string,
    callbackUrl: string,
    timeout: number
  ): Promise<SubscriptionResult> {
    const uri = this.resolveURL(this.getEventSubURL(serviceType))
    const options = this.requestOptions(uri, timeout)
    const response = await request(
      {
        ...options,
        method: 'SUBSCRIBE',
        headers: {
          ...options.headers,
          CALLBACK: `<${callbackUrl}>`,
          NT: 'upnp:event',
          TIMEOUT: 'Second-1800',
        },
      },
      `Could not subscribe to "${serviceType}"`
    )
    const sid = response.headers.sid
    if (typeof sid !== 'string') {
      throw new TR64Error(
        TR64ErrorCode.UnexpectedResponse,
        `Subscription to "${serviceType}" returned no sid`
      )
    }
    const timeoutHeader = response.headers.timeout
    return {
      sid,
      timeout: typeof timeoutHeader === 'string' ? timeoutHeader : undefined,
    }
  }

  protected async sendUnsubscription(
    serviceType: string,
    sid: string,
    timeout: number
  ): Promise<void> {
    const uri = this.resolveURL(this.getEventSubURL(serviceType))
    const options = this.requestOptions(uri, timeout)
    await request(
      {
        ...options,
        method: 'UNSUBSCRIBE',
        headers: { ...options.headers, SID: sid },
      },
      `Could not unsubscribe from "${serviceType}"`
    )
  }

  /**
   * subscribes to the events of a service, the subscription is renewed
   * until [[unsubscribe]] is called
   *
   * @param callbackUrl the url the device sends its notifications to
   */
  async subscribe(
    serviceType: string,
    callbackUrl: string,
    timeout = 3000
  ): Promise<SubscriptionResult> {
    const result = await this.sendSubscription(serviceType, callbackUrl, timeout)
    this.clearRenewal(serviceType)
    this.scheduleRenewal(serviceType, result.sid, callbackUrl, timeout)
    debug('Subscribed with sid', result.sid)
    return result
  }

  protected scheduleRenewal(
    serviceType: string,
    sid: string,
    callbackUrl: string,
    timeout: number
  ) {
    const subscription: Subscription = {
      sid,
      timer: setTimeout(() => {
        this.renew(serviceType, subscription, callbackUrl, timeout).catch(
          error => {
            debug(`Renewing subscription of ${serviceType} failed`, error)
          }
        )
      }, SUBSCRIPTION_RENEWAL),
    }
    this.subscriptions.set(serviceType, subscription)
  }

  /**
   * the renewed subscription replaces `current` only if that one is still
   * stored, a subscription ended meanwhile is cancelled at the device again
   */
  protected async renew(
    serviceType: string,
    current: Subscription,
    callbackUrl: string,
    timeout: number
  ): Promise<void> {
    const result = await this.sendSubscription(serviceType, callbackUrl, timeout)
    if (this.subscriptions.get(serviceType) !== current) {
      debug(`Subscription of ${serviceType} ended while renewing`)
      await this.sendUnsubscription(serviceType, result.sid, timeout)
      return
    }
    this.scheduleRenewal(serviceType, result.sid, callbackUrl, timeout)
    debug('Renewed with sid', result.sid)
  }

  protected clearRenewal(serviceType: string) {
    const subscription = this.subscriptions.get(serviceType)
    if (subscription) {
      clearTimeout(subscription.timer)
      this.subscriptions.delete(serviceType)
    }
    return subscription
  }

  /**
   * cancels the renewal of a subscription and tells the device to stop
   * sending events
   */
  async unsubscribe(serviceType: string, timeout = 3000): Promise<void> {
    const subscription = this.clearRenewal(serviceType)
    if (!subscription) {
      return
    }
    await this.sendUnsubscription(serviceType, subscription.sid, timeout)
    debug('Unsubscribed', serviceType)
  }

  /**
   * observes the events of the given service types (all evented services
   * by default). The event server is started and the services are subscribed
   * with the first observer, both is undone after the last one left.
   */
  observe(
    server: EventServer,
    serviceTypes?: readonly string[]
  ): Observable<DeviceEvent> {
    return new Observable<DeviceEvent>(subscriber => {
      const events = server.asObservable().subscribe(subscriber)
      const started = this.startObserving(server, serviceTypes).catch(
        (error: unknown) => {
          subscriber.error(error)
          return undefined
        }
      )
      return () => {
        events.unsubscribe()
        // a start still pending is stopped once it is done
        started
          .then(types => types && this.stopObserving(server, types))
          .catch(error => {
            debug('Stopping observation failed', error)
          })
      }
    }).pipe(
      map(event => ({
        ...event,
        serviceType: this.getServiceTypeBySid(event.sid),
      })),
      share()
    )
  }

  protected async startObserving(
    server: EventServer,
    serviceTypes: readonly string[] = this.eventServiceTypes
  ): Promise<readonly string[]> {
    await server.listen()
    const subscribed: string[] = []
    try {
      for (const type of serviceTypes) {
        debug('Subscribing', type)
        await this.subscribe(type, server.callback)
        subscribed.push(type)
      }
    } catch (error) {
      await this.stopObserving(server, subscribed)
      throw error
    }
    return serviceTypes
  }

  protected async stopObserving(
    server: EventServer,
    serviceTypes: readonly string[]
  ) {
    try {
      for (const type of serviceTypes) {
        await this.unsubscribe(type)
      }
    } finally {
      await server.close()
    }
  }
}
