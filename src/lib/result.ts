import { TR64Error, TR64ErrorCode } from './errors'
import type { ActionResult } from './soap'

export function readString(result: ActionResult, key: string): string {
  const value = result[key]
  if (value === undefined) {
    throw new TR64Error(
      TR64ErrorCode.MissingValue,
      `Result does not contain "${key}"`
    )
  }
  return value
}

export function readInt(result: ActionResult, key: string): number {
  const raw = readString(result, key)
  const value = parseInt(raw, 10)
  if (isNaN(value)) {
    throw new TR64Error(
      TR64ErrorCode.MissingValue,
      `Value of "${key}" is not a number: "${raw}"`
    )
  }
  return value
}

/** a flag is any integer, everything but 0 is true */
export const readBool = (result: ActionResult, key: string): boolean =>
  readInt(result, key) !== 0
