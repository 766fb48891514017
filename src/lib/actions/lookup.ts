/**
 * maps the methods of an action wrapper to the service type (or the service
 * type prefix, waiting for an interface id) they are executed on
 */
export type ServiceTypeLookup<M extends string> = Readonly<Record<M, string>>

const isMethod = <M extends string>(
  lookup: ServiceTypeLookup<M>,
  method: string
): method is M => Object.prototype.hasOwnProperty.call(lookup, method)

export const findServiceType = <M extends string>(
  lookup: ServiceTypeLookup<M>,
  method: string
): string | undefined => (isMethod(lookup, method) ? lookup[method] : undefined)

/** value for a flag argument of an action */
export const flag = (status: boolean) => (status ? 1 : 0)
