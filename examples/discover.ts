import { DeviceTR64, discoverParticularHost } from '../src'

discoverParticularHost('fritz.box')
  .then(result => {
    if (!result) {
      console.log('fritz.box did not answer')
      return
    }
    console.log(`${result.service} at ${result.location}`)
    const box = DeviceTR64.createFromURL(result.location, {
      username: 'test',
      password: 'test-secret',
    })
    return box
      .loadDeviceDefinitions(result.location)
      .then(() => console.log(box.deviceInformation))
  })
  .catch(err => {
    console.log(err)
  })
