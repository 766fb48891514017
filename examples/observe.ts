import { filter } from 'rxjs/operators'
import { DeviceTR64, EventServer } from '../src'

const box = new DeviceTR64({ host: 'fritz.box', username: 'test', password: 'test-secret' })
const server = new EventServer(9999, '192.168.178.20')

box
  .loadDeviceDefinitions(`${box.baseURL}/tr64desc.xml`)
  .then(() => box.loadSCPD(undefined, { ignoreFailures: true }))
  .then(() =>
    box
      .observe(server)
      .pipe(filter(event => event.variable !== 'SOAPEvent'))
      .subscribe({ next: console.log, error: console.error })
  )
  .catch(err => {
    console.log(err)
  })
