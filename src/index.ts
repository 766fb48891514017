export * from './lib/errors'
export * from './lib/model'
export { DeviceTR64, SUBSCRIPTION_RENEWAL, USER_AGENT } from './lib/device'
export type { LoadSCPDOptions } from './lib/device'
export { DEVICE_INFORMATION_FIELDS, parseDeviceDescription } from './lib/description'
export type {
  DeviceDescription,
  DeviceInformation,
  DeviceInformationField,
  ServiceDefinition,
} from './lib/description'
export { parseSCPD } from './lib/scpd'
export type { ActionSpec, ParameterSpec, ServiceSCPD } from './lib/scpd'
export { buildSoapMessage, parseSoapResponse } from './lib/soap'
export type { ActionArgumentValue, ActionArguments, ActionResult } from './lib/soap'
export { readBool, readInt, readString } from './lib/result'
export { request, requestXml } from './lib/request'
export type { RequestOptions } from './lib/request'
export {
  childText,
  extractFault,
  findChild,
  findChildren,
  parseXml,
  walk,
} from './lib/xml'
export type { FaultDetails, XmlElement } from './lib/xml'
export { EventServer } from './lib/eventserver'
export {
  DiscoveryResponse,
  discover,
  discoverParticularHost,
  rateServiceTypeInResult,
  searchMessage,
} from './lib/discover'
export type { DiscoverHostOptions, DiscoverOptions, SsdpSocket } from './lib/discover'
export * from './lib/presence'
export * from './lib/actions/lan'
export * from './lib/actions/wan'
export * from './lib/actions/wifi'
export * from './lib/actions/system'
export * from './lib/actions/fritz'
export { flag } from './lib/actions/lookup'
export type { ServiceTypeLookup } from './lib/actions/lookup'
