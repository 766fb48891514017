import { URL } from 'url'
import { TR64Error, TR64ErrorCode } from './errors'
import type { XmlElement } from './xml'

export interface ServiceDefinition {
  controlURL: string
  scpdURL?: string
  eventSubURL?: string
  /** set by a tolerant bulk scpd load if loading this service failed */
  error?: string
}

export const DEVICE_INFORMATION_FIELDS = [
  'deviceType',
  'friendlyName',
  'manufacturer',
  'manufacturerURL',
  'modelDescription',
  'modelName',
  'modelNumber',
  'modelURL',
  'serialNumber',
  'presentationURL',
  'UDN',
  'UPC',
] as const

export type DeviceInformationField = (typeof DEVICE_INFORMATION_FIELDS)[number]

export type DeviceInformation = { rootURL?: string } & {
  [field in DeviceInformationField]?: string
}

export interface DeviceDescription {
  definitions: Map<string, ServiceDefinition>
  information: DeviceInformation
  unknownKeys: Record<string, string>
}

const SKIPPED = ['iconlist', 'specversion']
const CONTAINERS = ['device', 'devicelist']

const informationField = (tag: string) =>
  DEVICE_INFORMATION_FIELDS.find(field => field.toLowerCase() === tag)

/** relative urls without leading slash are relative to the description */
const resolveUrl = (url: string, basePath: string) =>
  url.startsWith('/') || url.startsWith('http') ? url : basePath + url

function parseServiceList(
  serviceList: XmlElement,
  basePath: string,
  definitions: Map<string, ServiceDefinition>
) {
  for (const service of serviceList.children) {
    if (service.name.toLowerCase() !== 'service') {
      throw new TR64Error(
        TR64ErrorCode.InvalidDefinition,
        `Non service tag in servicelist: ${service.name}`
      )
    }
    let serviceType: string | undefined
    let specType: string | undefined
    let controlURL: string | undefined
    let scpdURL: string | undefined
    let eventSubURL: string | undefined

    for (const child of service.children) {
      switch (child.name.toLowerCase()) {
        case 'servicetype':
          serviceType = child.text
          break
        case 'spectype':
          specType = child.text
          break
        case 'controlurl':
          controlURL = resolveUrl(child.text, basePath)
          break
        case 'scpdurl':
          scpdURL = resolveUrl(child.text, basePath)
          break
        case 'eventsuburl':
          eventSubURL = resolveUrl(child.text, basePath)
          break
      }
    }
    const type = serviceType || specType
    if (!type || !controlURL) {
      throw new TR64Error(
        TR64ErrorCode.InvalidDefinition,
        `Service is not complete: ${type} - ${controlURL} - ${scpdURL}`
      )
    }
    if (definitions.has(type)) {
      throw new TR64Error(
        TR64ErrorCode.InvalidDefinition,
        `Service type '${type}' is defined twice.`
      )
    }
    definitions.set(type, { controlURL, scpdURL, eventSubURL })
  }
}

function collect(
  element: XmlElement,
  basePath: string,
  description: DeviceDescription
) {
  element.children.forEach(child => {
    const tag = child.name.toLowerCase()
    const field = informationField(tag)
    if (tag === 'servicelist') {
      parseServiceList(child, basePath, description.definitions)
    } else if (field) {
      if (description.information[field] === undefined) {
        description.information[field] = child.text
      }
    } else if (!SKIPPED.includes(tag)) {
      if (!CONTAINERS.includes(tag) && child.children.length === 0) {
        description.unknownKeys[child.name] = child.text
      }
      collect(child, basePath, description)
    }
  })
}

/**
 * extracts service definitions and device information out of a root device
 * description. Fresh containers are returned, so a failing parse never
 * touches already loaded state.
 *
 * @param url the location the description was loaded from
 * @param root the root element of the description
 */
export function parseDeviceDescription(
  url: string,
  root: XmlElement
): DeviceDescription {
  const path = new URL(url).pathname
  const basePath = path.substring(0, path.lastIndexOf('/')) + '/'
  const description: DeviceDescription = {
    definitions: new Map(),
    information: { rootURL: url },
    unknownKeys: {},
  }
  collect(root, basePath, description)
  return description
}
