import { Fritz } from '../src'

const box = new Fritz({ host: 'fritz.box', username: 'test', password: 'test-secret' })
box.setupTR64Device('fritz.box')

box
  .getCallList()
  .then(calls =>
    calls.forEach(call => console.log(call.Date, call.Caller, call.Called))
  )
  .catch(err => {
    console.log(err)
  })
