import { Lan } from '../src'

const box = new Lan({ host: 'fritz.box', username: 'test', password: 'test-secret' })
box.setupTR64Device('fritz.box')

box
  .getAllHostDetails()
  .then(hosts =>
    hosts.forEach(host =>
      console.log(host.active ? '+' : '-', host.macAddress, host.hostname)
    )
  )
  .catch(err => {
    console.log(err)
  })
