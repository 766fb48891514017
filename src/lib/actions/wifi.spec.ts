import anyTest from 'ava'
import type { TestFn } from 'ava'
import nock from 'nock'
import { expectAction } from '../testdata/helpers'
import { Wifi } from './wifi'

const test = anyTest as TestFn<{ wifi: Wifi }>

const WLAN = 'urn:dslforum-org:service:WLANConfiguration:'

test.before(() => {
  nock.disableNetConnect()
})

test.beforeEach(t => {
  const wifi = new Wifi()
  wifi.setupTR64Device('fritz.box')
  t.context.wifi = wifi
})

test.afterEach(() => {
  nock.cleanAll()
})

test.after(() => {
  nock.enableNetConnect()
})

test.serial('gets the basic information of a wifi', async t => {
  const values = {
    NewEnable: '1',
    NewStatus: 'Up',
    NewMaxBitRate: 'Auto',
    NewChannel: '6',
    NewSSID: 'home',
    NewBeaconType: '11i',
    NewMACAddressControlEnabled: '0',
    NewStandard: 'n',
    NewBSSID: '00:11:22:33:44:55',
    NewBasicEncryptionModes: 'None',
    NewBasicAuthenticationMode: 'None',
  }
  expectAction('/upnp/control/wlanconfig1', WLAN + 1, 'GetInfo', values)

  t.deepEqual(await t.context.wifi.getWifiInfo(), {
    enabled: true,
    status: 'Up',
    channel: 6,
    ssid: 'home',
    beaconType: '11i',
    macControl: false,
    standard: 'n',
    bssid: '00:11:22:33:44:55',
    encryptionMode: 'None',
    authMode: 'None',
    raw: values,
  })
})

test.serial('sets the ssid of the guest wifi', async t => {
  const scope = expectAction(
    '/upnp/control/wlanconfig3',
    WLAN + 3,
    'SetSSID',
    {},
    /<NewSSID>guests &amp; friends<\/NewSSID>/
  )

  await t.context.wifi.setSSID('guests & friends', 3)
  t.true(scope.isDone())
})

test.serial('sets the channel', async t => {
  const scope = expectAction(
    '/upnp/control/wlanconfig2',
    WLAN + 2,
    'SetChannel',
    {},
    /<NewChannel>36<\/NewChannel>/
  )

  await t.context.wifi.setChannel(36, 2)
  t.true(scope.isDone())
})

test.serial('gets the associated devices', async t => {
  expectAction('/upnp/control/wlanconfig1', WLAN + 1, 'GetTotalAssociations', {
    NewTotalAssociations: '1',
  })
  expectAction(
    '/upnp/control/wlanconfig1',
    WLAN + 1,
    'GetGenericAssociatedDeviceInfo',
    {
      NewAssociatedDeviceMACAddress: 'AA:BB:CC:DD:EE:FF',
      NewAssociatedDeviceIPAddress: '192.168.178.30',
      NewAssociatedDeviceAuthState: '1',
    },
    /<NewAssociatedDeviceIndex>0<\/NewAssociatedDeviceIndex>/
  )

  const { wifi } = t.context
  t.is(await wifi.getTotalAssociations(), 1)
  const device = await wifi.getGenericAssociatedDeviceInfo(0)
  t.is(device.macAddress, 'AA:BB:CC:DD:EE:FF')
  t.is(device.ipAddress, '192.168.178.30')
  t.true(device.authenticated)
})

test.serial('gets an associated device by its mac address', async t => {
  expectAction(
    '/upnp/control/wlanconfig1',
    WLAN + 1,
    'GetSpecificAssociatedDeviceInfo',
    {
      NewAssociatedDeviceIPAddress: '192.168.178.30',
      NewAssociatedDeviceAuthState: '0',
    },
    /<NewAssociatedDeviceMACAddress>AA:BB:CC:DD:EE:FF<\/NewAssociatedDeviceMACAddress>/
  )

  const device = await t.context.wifi.getSpecificAssociatedDeviceInfo('AA:BB:CC:DD:EE:FF')
  t.is(device.macAddress, 'AA:BB:CC:DD:EE:FF')
  t.false(device.authenticated)
})

test.serial('gets the packet statistic', async t => {
  expectAction('/upnp/control/wlanconfig1', WLAN + 1, 'GetPacketStatistics', {
    NewTotalPacketsSent: '100',
    NewTotalPacketsReceived: '200',
  })

  t.deepEqual(await t.context.wifi.getPacketStatistic(), [100, 200])
})
