import Debug from 'debug'
import { parseStringPromise as parseString, processors } from 'xml2js'
import type { ParserOptions } from 'xml2js'
import { TR64Error, TR64ErrorCode } from './errors'

const debug = Debug('tr64:xml')

/**
 * a namespace stripped, order preserving view of a parsed xml element
 */
export interface XmlElement {
  readonly name: string
  readonly text: string
  readonly attributes: Readonly<Record<string, string>>
  readonly children: readonly XmlElement[]
}

const PARSER_OPTIONS: ParserOptions = {
  explicitRoot: false,
  explicitChildren: true,
  preserveChildrenOrder: true,
  explicitCharkey: true,
  charsAsChildren: false,
  tagNameProcessors: [processors.stripPrefix],
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const toAttributes = (value: unknown): Record<string, string> => {
  const attributes: Record<string, string> = {}
  if (isRecord(value)) {
    Object.keys(value).forEach(key => {
      const attribute = value[key]
      if (typeof attribute === 'string') {
        attributes[key] = attribute
      }
    })
  }
  return attributes
}

/**
 * converts a node of the xml2js object tree into an [[XmlElement]]
 */
function toElement(node: unknown): XmlElement {
  if (!isRecord(node) || typeof node['#name'] !== 'string') {
    throw new TR64Error(TR64ErrorCode.InvalidXml, 'Unexpected xml node')
  }
  const children = node.$$
  const text = node._
  return {
    name: node['#name'],
    text: typeof text === 'string' ? text : '',
    attributes: toAttributes(node.$),
    children: Array.isArray(children) ? children.map(toElement) : [],
  }
}

/**
 * parses a xml document and returns its root element
 *
 * @param xml the document as string
 * @param context is prepended to the error message if parsing fails
 */
export async function parseXml(
  xml: string,
  context = 'Could not parse xml'
): Promise<XmlElement> {
  let result: unknown
  try {
    result = await parseString(xml, PARSER_OPTIONS)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new TR64Error(TR64ErrorCode.InvalidXml, `${context}: ${reason}`, {
      cause: error,
    })
  }
  if (result === null || result === undefined) {
    throw new TR64Error(TR64ErrorCode.InvalidXml, `${context}: empty document`)
  }
  return toElement(result)
}

const sameName = (element: XmlElement, name: string) =>
  element.name.toLowerCase() === name.toLowerCase()

/** first direct child with the given (case insensitive) name */
export const findChild = (
  element: XmlElement,
  name: string
): XmlElement | undefined => element.children.find(el => sameName(el, name))

export const findChildren = (
  element: XmlElement,
  name: string
): XmlElement[] => element.children.filter(el => sameName(el, name))

/** text of the first direct child with the given name */
export const childText = (
  element: XmlElement,
  name: string
): string | undefined => findChild(element, name)?.text

/**
 * iterates over the element and all of its descendants in document order
 */
export function* walk(element: XmlElement): IterableIterator<XmlElement> {
  yield element
  for (const child of element.children) {
    yield* walk(child)
  }
}

export interface FaultDetails {
  text: string
  upnpErrorCode?: number
  upnpErrorDescription?: string
}

/**
 * extracts a human readable error out of a soap fault body. Every element
 * below the first element of the body whose name ends with `string` or
 * `description` contributes its text. Bodies that are no xml at all yield
 * an empty text.
 */
export async function extractFault(body: string): Promise<FaultDetails> {
  let root: XmlElement
  try {
    root = await parseXml(body)
  } catch (error) {
    debug('No fault details in body', error)
    return { text: '' }
  }
  const fault = root.children[0]?.children[0]
  if (!fault) {
    return { text: '' }
  }
  let text = ''
  let upnpErrorCode: number | undefined
  let upnpErrorDescription: string | undefined
  for (const element of walk(fault)) {
    const name = element.name.toLowerCase()
    if (name.endsWith('string') || name.endsWith('description')) {
      text += element.text + ' '
    }
    if (name === 'errorcode' && upnpErrorCode === undefined) {
      const code = parseInt(element.text, 10)
      upnpErrorCode = isNaN(code) ? undefined : code
    }
    if (name === 'errordescription' && upnpErrorDescription === undefined) {
      upnpErrorDescription = element.text
    }
  }
  return { text, upnpErrorCode, upnpErrorDescription }
}
