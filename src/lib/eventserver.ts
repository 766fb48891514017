import Debug from 'debug'
import { createServer } from 'http'
import type { IncomingMessage, Server, ServerResponse } from 'http'
import type { AddressInfo } from 'net'
import { Observable, Subject } from 'rxjs'
import { TR64Error, TR64ErrorCode } from './errors'
import type { DeviceEvent } from './model'
import { findChildren, parseXml } from './xml'

const debug = Debug('tr64:eventserver')

const headerValue = (value: string | string[] | undefined) =>
  Array.isArray(value) ? value[0] : value

/**
 * provides an http server that handles the notifications of subscribed
 * services, parses the xml and emits every property via an observable
 */
export class EventServer {
  protected readonly server: Server

  protected messages = new Subject<DeviceEvent>()

  get listening(): boolean {
    return this.server.listening
  }

  /** the port actually bound, differs from the configured one for port 0 */
  get boundPort(): number {
    const address = this.server.address()
    return this.listening && isAddressInfo(address) ? address.port : this.port
  }

  get callback(): string {
    return `http://${this.address}:${this.boundPort}`
  }

  constructor(
    protected readonly port: number,
    protected readonly address: string
  ) {
    if (!address || !Number.isInteger(port) || port < 0) {
      throw new TR64Error(
        TR64ErrorCode.InvalidArgument,
        'eventserver address and/or port missing'
      )
    }
    this.server = createServer((req, res) => this.handleRequest(req, res))
  }

  protected async parseEvent(body: string, sid: string, seq?: number) {
    const propertySet = await parseXml(
      body.replace(/[\s\0]+$/, ''),
      'Invalid event notification'
    )
    const events: DeviceEvent[] = []
    findChildren(propertySet, 'property').forEach(property => {
      property.children.forEach(variable => {
        events.push({ sid, seq, variable: variable.name, value: variable.text })
      })
    })
    return events
  }

  /**
   * starts listening at the specified interface and port
   */
  listen(): Promise<void> {
    if (this.listening) {
      return Promise.resolve()
    }
    debug('Listening at', this.address, this.port)
    return new Promise((resolve, reject) => {
      const onError = (error: Error) => {
        reject(
          new TR64Error(
            TR64ErrorCode.Transport,
            `eventserver could not listen: ${error.message}`,
            { cause: error }
          )
        )
      }
      this.server.once('error', onError)
      this.server.listen(this.port, this.address, () => {
        this.server.removeListener('error', onError)
        resolve()
      })
    })
  }

  /**
   * stops listening to events
   */
  close(): Promise<void> {
    if (!this.listening) {
      return Promise.resolve()
    }
    debug('stop listening')
    return new Promise((resolve, reject) => {
      this.server.close(error => (error ? reject(error) : resolve()))
    })
  }

  asObservable(): Observable<DeviceEvent> {
    return this.messages.asObservable()
  }

  protected handleRequest(req: IncomingMessage, res: ServerResponse) {
    const chunks: Buffer[] = []
    req
      .on('data', (chunk: Buffer) => {
        chunks.push(chunk)
      })
      .on('end', () => {
        const sid = headerValue(req.headers.sid) ?? ''
        const seq = parseInt(headerValue(req.headers.seq) ?? '', 10)
        this.parseEvent(
          Buffer.concat(chunks).toString(),
          sid,
          isNaN(seq) ? undefined : seq
        ).then(
          events => {
            res.end()
            events.forEach(event => {
              debug('Emitting', event.variable)
              this.messages.next(event)
            })
          },
          error => {
            debug('Dropping notification', error)
            res.statusCode = 400
            res.end()
          }
        )
      })
  }
}

function isAddressInfo(
  address: string | AddressInfo | null
): address is AddressInfo {
  return typeof address === 'object' && address !== null
}
