import superjson from "superjson"

/** Turns payloads into the strings the cache stores */
export interface PayloadCodec<T> {
  encode(value: T): string
  /** May throw on input it did not produce */
  decode(raw: string): T
}

/** Default codec. Restores Dates, Maps, Sets and bigints on the way out. */
export function superjsonCodec<T>(): PayloadCodec<T> {
  return {
    encode: (value) => superjson.stringify(value),
    decode: (raw) => superjson.parse<T>(raw),
  }
}

/** Stores strings as-is */
export const rawStringCodec: PayloadCodec<string> = {
  encode: (value) => value,
  decode: (raw) => raw,
}
