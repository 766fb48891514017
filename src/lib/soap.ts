import { create } from 'xmlbuilder'
import { TR64Error, TR64ErrorCode } from './errors'
import { findChild, walk } from './xml'
import type { XmlElement } from './xml'

export type ActionArgumentValue = string | number | boolean
export type ActionArguments = Readonly<Record<string, ActionArgumentValue>>
/** flat map of the direct children of an action response */
export type ActionResult = Readonly<Record<string, string>>

const SOAP_ENCODING = 'http://schemas.xmlsoap.org/soap/encoding/'
const SOAP_ENVELOPE = 'http://schemas.xmlsoap.org/soap/envelope/'

const stringify = (value: ActionArgumentValue): string => {
  if (typeof value === 'boolean') {
    return value ? '1' : '0'
  }
  return String(value)
}

/**
 * builds the soap 1.1 envelope for calling `action` of `serviceType`.
 * Argument values are escaped by xmlbuilder.
 */
export function buildSoapMessage(
  action: string,
  serviceType: string,
  args: ActionArguments = {}
): string {
  const vars: Record<string, string> = {}
  Object.keys(args).forEach(name => {
    vars[name] = stringify(args[name])
  })
  const root = {
    's:Envelope': {
      '@s:encodingStyle': SOAP_ENCODING,
      '@xmlns:s': SOAP_ENVELOPE,
      's:Body': {
        ['u:' + action]: {
          '@xmlns:u': serviceType,
          ...vars,
        },
      },
    },
  }
  return create(root, { version: '1.0', encoding: 'UTF-8' }).end()
}

const faultError = (fault: XmlElement, action: string): TR64Error => {
  let upnpErrorCode: number | undefined
  let upnpErrorDescription: string | undefined
  let faultString = ''
  for (const element of walk(fault)) {
    const name = element.name.toLowerCase()
    if (name === 'faultstring') {
      faultString = element.text
    } else if (name === 'errorcode') {
      const code = parseInt(element.text, 10)
      upnpErrorCode = isNaN(code) ? undefined : code
    } else if (name === 'errordescription') {
      upnpErrorDescription = element.text
    }
  }
  return new TR64Error(
    TR64ErrorCode.SoapFault,
    `Device responded to "${action}" with fault: ${faultString} ${upnpErrorCode ?? ''} ${upnpErrorDescription ?? ''}`.trim(),
    { upnpErrorCode, upnpErrorDescription }
  )
}

/**
 * unwraps envelope and body of a soap response and flattens the children of
 * the `<action>Response` element into a map
 */
export function parseSoapResponse(
  envelope: XmlElement,
  action: string
): ActionResult {
  const body = findChild(envelope, 'Body') ?? envelope.children[0]
  const response = body?.children[0]
  if (!response) {
    throw new TR64Error(
      TR64ErrorCode.UnexpectedResponse,
      `Soap result structure is wrong, no response found for action "${action}"`
    )
  }
  if (response.name === 'Fault') {
    throw faultError(response, action)
  }
  if (response.name !== action + 'Response') {
    throw new TR64Error(
      TR64ErrorCode.UnexpectedResponse,
      `Soap result structure is wrong, expected action "${action}Response" got "${response.name}"`
    )
  }
  const result: Record<string, string> = {}
  response.children.forEach(child => {
    result[child.name] = child.text
  })
  return result
}
