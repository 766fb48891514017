/**
 * the kinds of failures a [[TR64Error]] can carry, so callers can branch on
 * `code` instead of matching message texts
 */
export enum TR64ErrorCode {
  InvalidArgument = 'INVALID_ARGUMENT',
  UnknownService = 'UNKNOWN_SERVICE',
  InvalidDefinition = 'INVALID_DEFINITION',
  HttpError = 'HTTP_ERROR',
  Transport = 'TRANSPORT',
  InvalidXml = 'INVALID_XML',
  SoapFault = 'SOAP_FAULT',
  UnexpectedResponse = 'UNEXPECTED_RESPONSE',
  MissingValue = 'MISSING_VALUE',
}

export interface TR64ErrorDetails {
  statusCode?: number
  upnpErrorCode?: number
  upnpErrorDescription?: string
  cause?: unknown
}

/** UPnP error code a device answers with if an array index or key is unknown */
export const UPNP_NO_SUCH_ENTRY = 714

export class TR64Error extends Error {
  readonly statusCode?: number
  readonly upnpErrorCode?: number
  readonly upnpErrorDescription?: string

  constructor(
    readonly code: TR64ErrorCode,
    message: string,
    details: TR64ErrorDetails = {}
  ) {
    super(message, { cause: details.cause })
    this.name = 'TR64Error'
    this.statusCode = details.statusCode
    this.upnpErrorCode = details.upnpErrorCode
    this.upnpErrorDescription = details.upnpErrorDescription
  }
}

export const isTR64Error = (
  error: unknown,
  code?: TR64ErrorCode
): error is TR64Error =>
  error instanceof TR64Error && (code === undefined || error.code === code)
