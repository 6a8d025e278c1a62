import type { Milliseconds } from "../ports/time"
import { InvalidExpiryError } from "./errors"

/**
 * Whole milliseconds to send as `PX`, rounded up so a sub-millisecond expiry
 * still lasts one millisecond. Anything Redis would refuse as an integer
 * argument is rejected here instead.
 */
export function expiryToPx(expiry: Milliseconds): number {
  const px = Math.ceil(expiry)

  if (!(px > 0 && Number.isSafeInteger(px))) throw new InvalidExpiryError(expiry)

  return px
}
