import test from 'ava'
import type { RemoteInfo } from 'dgram'
import { EventEmitter } from 'events'
import nock from 'nock'
import {
  DiscoveryResponse,
  discover,
  discoverParticularHost,
  rateServiceTypeInResult,
  searchMessage,
} from './discover'
import type { SsdpSocket } from './discover'
import { TR64ErrorCode } from './errors'
import type { TR64Error } from './errors'
import { fixture } from './testdata/helpers'

const REMOTE: RemoteInfo = {
  address: '127.0.0.1',
  family: 'IPv4',
  port: 1900,
  size: 0,
}

const IGD_UPNP = 'urn:schemas-upnp-org:device:InternetGatewayDevice:1'
const IGD_DSLFORUM = 'urn:dslforum-org:device:InternetGatewayDevice:1'

const answer = (location: string, service: string) =>
  'HTTP/1.1 200 OK\r\n' +
  'CACHE-CONTROL: max-age=1800\r\n' +
  `LOCATION: ${location}\r\n` +
  'SERVER: Test UPnP/1.0\r\n' +
  `ST: ${service}\r\n` +
  `USN: uuid:739f2409-bccb-40e7-8e6c-000000000001::${service}\r\n\r\n`

/**
 * answers every search it sends with the datagrams of `respond`
 */
class FakeSocket extends EventEmitter implements SsdpSocket {
  readonly sent: string[] = []
  ttl?: number
  closed = false

  constructor(private readonly respond: (service: string) => string[]) {
    super()
  }

  bind(callback: () => void) {
    setImmediate(callback)
  }

  setMulticastTTL(ttl: number) {
    this.ttl = ttl
  }

  send(
    message: Buffer,
    port: number,
    address: string,
    callback: (error: Error | null) => void
  ) {
    const text = message.toString('utf8')
    this.sent.push(`${address}:${port} ${text}`)
    callback(null)
    const service = /\r\nST: (.*)\r\n/.exec(text)?.[1] ?? ''
    this.respond(service).forEach(datagram =>
      setImmediate(() => {
        if (!this.closed) {
          this.emit('message', Buffer.from(datagram, 'utf8'), REMOTE)
        }
      })
    )
  }

  close() {
    this.closed = true
  }
}

const factory = (respond: (service: string) => string[]) => {
  const sockets: FakeSocket[] = []
  const socketFactory = () => {
    const socket = new FakeSocket(respond)
    sockets.push(socket)
    return socket
  }
  return { sockets, socketFactory }
}

test.before(() => {
  nock.disableNetConnect()
})

test.after(() => {
  nock.enableNetConnect()
})

test('sends every search twice on a fresh socket per retry', async t => {
  const { sockets, socketFactory } = factory(() => [])

  const results = await discover({
    service: ['upnp:rootdevice', IGD_DSLFORUM],
    timeout: 20,
    socketFactory,
  })

  t.deepEqual(results, [])
  t.is(sockets.length, 2)
  const search = (service: string) =>
    '239.255.255.250:1900 ' +
    'M-SEARCH * HTTP/1.1\r\n' +
    'MX: 5\r\n' +
    'MAN: "ssdp:discover"\r\n' +
    'HOST: 239.255.255.250:1900\r\n' +
    `ST: ${service}\r\n\r\n`
  sockets.forEach(socket => {
    t.is(socket.ttl, 2)
    t.true(socket.closed)
    t.deepEqual(socket.sent, [
      search('upnp:rootdevice'),
      search(IGD_DSLFORUM),
      search('upnp:rootdevice'),
      search(IGD_DSLFORUM),
    ])
  })
})

test('builds the search for a multicast address', t => {
  t.is(
    searchMessage('ssdp:all', '10.0.0.255', 1901),
    'M-SEARCH * HTTP/1.1\r\nMX: 5\r\nMAN: "ssdp:discover"\r\nHOST: 10.0.0.255:1901\r\nST: ssdp:all\r\n\r\n'
  )
})

test('keeps the last response of a location', async t => {
  const location = 'http://192.168.178.1:49000/tr64desc.xml'
  const { socketFactory } = factory(() => [
    answer(location, 'upnp:rootdevice'),
    answer(location, IGD_DSLFORUM),
  ])

  const results = await discover({ timeout: 20, retries: 1, socketFactory })

  t.is(results.length, 1)
  t.is(results[0].location, location)
  t.is(results[0].service, IGD_DSLFORUM)
})

test('skips datagrams that are no discovery response', async t => {
  const { socketFactory } = factory(() => [
    'NOTIFY * HTTP/1.1\r\nHOST: 239.255.255.250:1900\r\nNT: upnp:rootdevice\r\n\r\n',
    'HTTP/1.1 200 OK\r\nST: upnp:rootdevice\r\n\r\n',
    answer('not a url', 'upnp:rootdevice'),
    answer('http://192.168.178.1:49000/tr64desc.xml', 'upnp:rootdevice'),
  ])

  const results = await discover({ timeout: 20, retries: 1, socketFactory })

  t.deepEqual(
    results.map(result => result.location),
    ['http://192.168.178.1:49000/tr64desc.xml']
  )
})

test('fails if a search can not be sent', async t => {
  class BrokenSocket extends FakeSocket {
    send(
      message: Buffer,
      port: number,
      address: string,
      callback: (error: Error | null) => void
    ) {
      callback(new Error('network unreachable'))
    }
  }
  const socket = new BrokenSocket(() => [])

  const error = await t.throwsAsync<TR64Error>(
    discover({ timeout: 20, socketFactory: () => socket })
  )
  t.is(error?.code, TR64ErrorCode.Transport)
  t.is(error?.message, 'Discovery failed: network unreachable')
  t.true(socket.closed)
})

test('fails if the socket rejects the multicast ttl', async t => {
  class UnboundSocket extends FakeSocket {
    setMulticastTTL(): void {
      throw new Error('setMulticastTTL EBADF')
    }
  }
  const socket = new UnboundSocket(() => [])

  const error = await t.throwsAsync<TR64Error>(
    discover({ timeout: 20, socketFactory: () => socket })
  )
  t.is(error?.code, TR64ErrorCode.Transport)
  t.is(error?.message, 'Discovery failed: setMulticastTTL EBADF')
  t.deepEqual(socket.sent, [])
  t.true(socket.closed)
})

test('parses the headers of a response case insensitive', t => {
  const response = DiscoveryResponse.parse(
    'HTTP/1.1 200 OK\r\n' +
      'Location: http://192.168.178.1:49000/tr64desc.xml\r\n' +
      'st: urn:dslforum-org:device:InternetGatewayDevice:1\r\n' +
      'Usn: uuid:1::urn:dslforum-org:device:InternetGatewayDevice:1\r\n\r\n'
  )
  t.is(response.location, 'http://192.168.178.1:49000/tr64desc.xml')
  t.is(response.locationProtocol, 'http')
  t.is(response.locationHost, '192.168.178.1')
  t.is(response.locationPort, 49000)
  t.is(response.locationPath, '/tr64desc.xml')
  t.is(response.service, IGD_DSLFORUM)
  t.is(response.usn, 'uuid:1::urn:dslforum-org:device:InternetGatewayDevice:1')
})

test('creates a response of a known location', t => {
  const secure = DiscoveryResponse.create('https://fritz.box/tr64desc.xml')
  t.is(secure.locationPort, 443)
  t.is(secure.service, 'uuid:none')
  t.is(secure.usn, 'none')

  t.is(DiscoveryResponse.create('http://fritz.box/tr64desc.xml').locationPort, 80)
  t.throws(() => DiscoveryResponse.create('fritz.box'), {
    message: 'Invalid location: fritz.box',
  })
})

test('rates specific service types higher', t => {
  const rate = (service: string) =>
    rateServiceTypeInResult(
      DiscoveryResponse.create('http://192.168.178.1/desc.xml', service)
    )
  t.is(rate(IGD_DSLFORUM), 11)
  t.is(rate('urn:dslforum-org:service:WANIPConnection:1'), 10)
  t.is(rate('urn:dslforum-org:other'), 9)
  t.is(rate(IGD_UPNP), 8)
  t.is(rate('urn:schemas-upnp-org:service:WANIPConnection:1'), 7)
  t.is(rate('urn:schemas-upnp-org:other'), 6)
  t.is(rate('urn:schemas-any-com:device:Light:1'), 5)
  t.is(rate('urn:other'), 4)
  t.is(rate('upnp:rootdevice'), 3)
  t.is(rate('uuid:739f2409-bccb-40e7-8e6c-000000000001'), 2)
  t.is(rate('ssdp:all'), 1)
  t.is(rateServiceTypeInResult(undefined), 0)
})

test.serial('searches a host more specific with its device type', async t => {
  const { sockets, socketFactory } = factory(service => {
    if (service === 'ssdp:all') {
      return [
        answer('http://127.0.0.1:49000/tr64desc.xml', 'upnp:rootdevice'),
        answer('http://127.0.0.1:49000/igddesc.xml', IGD_UPNP),
        answer('http://192.168.1.2:80/desc.xml', IGD_DSLFORUM),
      ]
    }
    if (service === IGD_DSLFORUM) {
      return [answer('http://127.0.0.1:49000/tr64desc.xml', IGD_DSLFORUM)]
    }
    return []
  })
  nock('http://127.0.0.1:49000')
    .get('/igddesc.xml')
    .reply(
      200,
      `<root><device><deviceType>${IGD_UPNP}</deviceType></device></root>`
    )

  const result = await discoverParticularHost('127.0.0.1', {
    timeout: 20,
    retries: 1,
    socketFactory,
  })

  t.is(result?.location, 'http://127.0.0.1:49000/tr64desc.xml')
  t.is(result?.service, IGD_DSLFORUM)
  t.is(sockets.length, 2)
  t.deepEqual(
    sockets[1].sent.map(message => /\r\nST: (.*)\r\n/.exec(message)?.[1]),
    [
      'upnp:rootdevice',
      IGD_UPNP,
      IGD_DSLFORUM,
      'upnp:rootdevice',
      IGD_UPNP,
      IGD_DSLFORUM,
    ]
  )
  nock.cleanAll()
})

test.serial('takes the given location if its device type matches', async t => {
  nock('http://127.0.0.1:49000')
    .get('/tr64desc.xml')
    .reply(200, fixture('tr64desc.xml'))

  const result = await discoverParticularHost('127.0.0.1', {
    deviceDefinitionURL: 'http://127.0.0.1:49000/tr64desc.xml',
    service: IGD_DSLFORUM,
    socketFactory: () => {
      throw new Error('no search expected')
    },
  })

  t.is(result?.location, 'http://127.0.0.1:49000/tr64desc.xml')
  t.is(result?.service, IGD_DSLFORUM)
  nock.cleanAll()
})

test.serial('finds nothing if no response belongs to the host', async t => {
  const { socketFactory } = factory(() => [
    answer('http://192.168.1.2:80/desc.xml', IGD_DSLFORUM),
  ])

  const result = await discoverParticularHost('127.0.0.1', {
    timeout: 20,
    retries: 1,
    socketFactory,
  })
  t.is(result, undefined)
})
