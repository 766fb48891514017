import { readFileSync } from 'fs'
import nock from 'nock'
import { join } from 'path'

export const BASE = 'http://fritz.box:49000'

export const fixture = (name: string) =>
  readFileSync(join(__dirname, name), 'utf8')

/** the answer of a device to a successful soap action */
export const soapResponse = (
  action: string,
  serviceType: string,
  values: Record<string, string> = {}
) =>
  '<?xml version="1.0"?>\n' +
  '<s:Envelope xmlns:s="http://schemas.xmlsoap.org/soap/envelope/" s:encodingStyle="http://schemas.xmlsoap.org/soap/encoding/">\n' +
  '<s:Body>\n' +
  `<u:${action}Response xmlns:u="${serviceType}">\n` +
  Object.entries(values)
    .map(([name, value]) => `<${name}>${value}</${name}>\n`)
    .join('') +
  `</u:${action}Response>\n` +
  '</s:Body>\n' +
  '</s:Envelope>'

/** the answer of a device to a failed soap action */
export const soapFault = (errorCode: number, errorDescription: string) =>
  '<?xml version="1.0"?>\n' +
  '<s:Envelope xmlns:s="http://schemas.xmlsoap.org/soap/envelope/" s:encodingStyle="http://schemas.xmlsoap.org/soap/encoding/">\n' +
  '<s:Body>\n' +
  '<s:Fault>\n' +
  '<faultcode>s:Client</faultcode>\n' +
  '<faultstring>UPnPError</faultstring>\n' +
  '<detail>\n' +
  '<UPnPError xmlns="urn:dslforum-org:control-1-0">\n' +
  `<errorCode>${errorCode}</errorCode>\n` +
  `<errorDescription>${errorDescription}</errorDescription>\n` +
  '</UPnPError>\n' +
  '</detail>\n' +
  '</s:Fault>\n' +
  '</s:Body>\n' +
  '</s:Envelope>'

/**
 * expects the execution of an action at the default Fritz!Box address and
 * answers it with the given values
 *
 * @param body matches the sent envelope, e.g. the expected arguments
 */
export const expectAction = (
  controlURL: string,
  serviceType: string,
  action: string,
  values: Record<string, string> = {},
  body: RegExp = /.*/
) =>
  nock(BASE)
    .matchHeader('soapaction', `"${serviceType}#${action}"`)
    .post(controlURL, body)
    .reply(200, soapResponse(action, serviceType, values))
