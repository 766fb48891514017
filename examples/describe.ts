import { DeviceTR64 } from '../src'

const box = new DeviceTR64({ host: 'fritz.box', username: 'test', password: 'test-secret' })

box
  .loadDeviceDefinitions(`${box.baseURL}/tr64desc.xml`)
  .then(() => box.loadSCPD(undefined, { ignoreFailures: true }))
  .then(() => console.log(JSON.stringify(box.describe(), null, 2)))
  .catch(err => {
    console.log(err)
  })
