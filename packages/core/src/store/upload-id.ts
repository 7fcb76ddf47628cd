/**
 * Upload ids: Crockford base32, 10 characters of millisecond time followed
 * by 16 random characters, so ids of later uploads sort after earlier ones.
 *
 * @module store/upload-id
 */

import { getRandomValues } from 'node:crypto'

const ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ'
const TIME_CHARS = 10
const RANDOM_CHARS = 16
const UPLOAD_ID_PATTERN = new RegExp(`^[${ALPHABET}]{${TIME_CHARS + RANDOM_CHARS}}$`)

export function createUploadId(at: Date = new Date()): string {
  let time = at.getTime()
  const timePart: string[] = []
  while (timePart.length < TIME_CHARS) {
    timePart.unshift(ALPHABET.charAt(time % ALPHABET.length))
    time = Math.floor(time / ALPHABET.length)
  }

  const randomPart = Array.from(getRandomValues(new Uint8Array(RANDOM_CHARS)), (byte) =>
    ALPHABET.charAt(byte % ALPHABET.length),
  )
  return timePart.join('') + randomPart.join('')
}

export function isUploadId(value: string): boolean {
  return UPLOAD_ID_PATTERN.test(value)
}

/** Creation time of a generated upload id, or null for ids supplied by callers. */
export function uploadIdTime(id: string): Date | null {
  if (!isUploadId(id)) return null
  let time = 0
  for (const char of id.slice(0, TIME_CHARS)) {
    time = time * ALPHABET.length + ALPHABET.indexOf(char)
  }
  return new Date(time)
}
