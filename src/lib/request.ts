import Debug from 'debug'
import requestOrig from 'request'
import type { CoreOptions, Response, UriOptions, UrlOptions } from 'request'
import { TR64Error, TR64ErrorCode } from './errors'
import { extractFault, parseXml } from './xml'
import type { XmlElement } from './xml'
export type { CoreOptions, Headers, Response, UriOptions, UrlOptions } from 'request'

const debug = Debug('tr64:request')

export type RequestOptions =
  | (UriOptions & CoreOptions)
  | (UrlOptions & CoreOptions)

const bodyText = (response: Response): string =>
  typeof response.body === 'string' ? response.body : ''

/**
 * wraps [request](https://github.com/request/request) in a promise
 * and rejects if the statuscode is not 200. The error then carries the status,
 * the reason and the error text a device put into its soap fault.
 *
 * @param options the [request options](https://github.com/request/request)
 * @param context prefix of the error messages, e.g. the action that failed
 */
export function request(
  options: RequestOptions,
  context = 'Request failed'
): Promise<Response> {
  return new Promise((resolve, reject) => {
    requestOrig(options, (error: unknown, response: Response) => {
      if (error) {
        const reason = error instanceof Error ? error.message : String(error)
        reject(
          new TR64Error(TR64ErrorCode.Transport, `${context}: ${reason}`, {
            cause: error,
          })
        )
      } else if (response.statusCode !== 200) {
        debug('Invalid response', response.statusCode, response.body)
        extractFault(bodyText(response)).then(fault => {
          reject(
            new TR64Error(
              TR64ErrorCode.HttpError,
              `${context}: ${response.statusCode} - ${response.statusMessage} -- ${fault.text}`,
              {
                statusCode: response.statusCode,
                upnpErrorCode: fault.upnpErrorCode,
                upnpErrorDescription: fault.upnpErrorDescription,
              }
            )
          )
        }, reject)
      } else {
        resolve(response)
      }
    })
  })
}

/**
 * like [[request]] but additionally parses the response body as xml
 */
export async function requestXml(
  options: RequestOptions,
  context = 'Request failed'
): Promise<XmlElement> {
  debug('Requesting', 'uri' in options ? options.uri : options.url)
  const response = await request(options, context)
  return parseXml(bodyText(response), context)
}
