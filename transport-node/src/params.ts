/**
 * Bootstrap parameter codec.
 *
 * Encoding: JSON object → zlib deflate → base64 (standard alphabet, padded).
 * Decoding reverses each step and rejects anything that is not a JSON object.
 *
 * @module
 */
import { deflateSync, inflateSync } from 'node:zlib'
import { deepFreeze, errorMessage, isJsonObject, type Params, ParamsError } from '@pipes-protocol/sdk'

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/

/**
 * Encode params into the form a launcher places in the environment.
 */
export function encodeParams(params: Params): string {
  return deflateSync(Buffer.from(JSON.stringify(params), 'utf-8')).toString('base64')
}

/**
 * Decode an encoded params value.
 *
 * @param value - The encoded value (whitespace anywhere is ignored)
 * @param key - Name of the variable or flag the value came from, for error messages
 * @returns Frozen params mapping
 * @throws ParamsError if the value is empty, not base64, not zlib data,
 *   not JSON, or not a JSON object
 */
export function decodeParams(value: string, key?: string): Params {
  // Line wraps are not part of the value
  const encoded = value.replace(/\s+/g, '')
  if (encoded === '') {
    throw new ParamsError('value is empty', key)
  }
  if (encoded.length % 4 !== 0 || !BASE64_PATTERN.test(encoded)) {
    throw new ParamsError('value is not valid base64', key)
  }

  let json: string
  try {
    json = inflateSync(Buffer.from(encoded, 'base64')).toString('utf-8')
  } catch (err) {
    throw new ParamsError(`value is not zlib-compressed data: ${errorMessage(err)}`, key, {
      cause: err
    })
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(json)
  } catch (err) {
    throw new ParamsError(`value is not valid JSON: ${errorMessage(err)}`, key, { cause: err })
  }

  if (!isJsonObject(parsed)) {
    const actual = parsed === null ? 'null' : Array.isArray(parsed) ? 'array' : typeof parsed
    throw new ParamsError(`value must decode to a JSON object, got ${actual}`, key)
  }

  return deepFreeze(parsed)
}
