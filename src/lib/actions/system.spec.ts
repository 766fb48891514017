import anyTest from 'ava'
import type { TestFn } from 'ava'
import nock from 'nock'
import { expectAction } from '../testdata/helpers'
import { System } from './system'

const test = anyTest as TestFn<{ system: System }>

test.before(() => {
  nock.disableNetConnect()
})

test.beforeEach(t => {
  const system = new System()
  system.setupTR64Device('fritz.box')
  t.context.system = system
})

test.afterEach(() => {
  nock.cleanAll()
})

test.after(() => {
  nock.enableNetConnect()
})

test.serial('gets the system information', async t => {
  expectAction(
    '/upnp/control/deviceinfo',
    'urn:dslforum-org:service:DeviceInfo:1',
    'GetInfo',
    {
      NewManufacturerName: 'AVM',
      NewManufacturerOUI: '00040E',
      NewModelName: 'Test Box 7490',
      NewDescription: 'Test Box 7490 113.07.12',
      NewProductClass: 'Box',
      NewSerialNumber: 'XXXXXXX',
      NewSoftwareVersion: '113.07.12',
      NewHardwareVersion: 'Test Box 7490',
      NewSpecVersion: '1.0',
      NewProvisioningCode: '',
      NewUpTime: '7536398',
      NewDeviceLog: 'LOGFILE',
    }
  )

  const info = await t.context.system.getSystemInfo()
  t.is(info.manufactureName, 'AVM')
  t.is(info.modelName, 'Test Box 7490')
  t.is(info.softwareVersion, '113.07.12')
  t.is(info.uptime, 7536398)
  t.is(info.log, 'LOGFILE')
})

test.serial('gets the time settings', async t => {
  expectAction('/upnp/control/time', 'urn:dslforum-org:service:Time:1', 'GetInfo', {
    NewNTPServer1: 'ntp.example.com',
    NewNTPServer2: '',
    NewCurrentLocalTime: '2024-01-01T12:00:00+01:00',
    NewLocalTimeZone: 'CET-1CEST',
    NewLocalTimeZoneName: 'CET',
    NewDaylightSavingsUsed: '1',
    NewDaylightSavingsStart: '2024-03-31T02:00:00',
    NewDaylightSavingsEnd: '2024-10-27T03:00:00',
  })

  const info = await t.context.system.getTimeInfo()
  t.is(info.ntpServer1, 'ntp.example.com')
  t.is(info.ntpServer2, '')
  t.is(info.localTimeZoneName, 'CET')
  t.true(info.isDaylightSaving)
  t.is(info.daylightSavingStart, '2024-03-31T02:00:00')
  t.is(info.daylightSavingEnd, '2024-10-27T03:00:00')
})

test.serial('knows whether an update is available', async t => {
  expectAction('/upnp/control/userif', 'urn:dslforum-org:service:UserInterface:1', 'GetInfo', {
    NewUpgradeAvailable: '0',
    NewPasswordRequired: '0',
  })

  t.false(await t.context.system.softwareUpdateAvailable())
})

test.serial('reboots the device', async t => {
  const scope = expectAction(
    '/upnp/control/deviceconfig',
    'urn:dslforum-org:service:DeviceConfig:1',
    'Reboot'
  )

  await t.context.system.reboot()
  t.true(scope.isDone())
})
