/**
 * Resolve a caller's TextGrid input into document text.
 *
 * Praat saves TextGrids as UTF-8 or, when labels need it, UTF-16 with a
 * byte-order mark; bytes are decoded accordingly.
 */

import { readFile } from "node:fs/promises"
import type { Readable } from "node:stream"
import { Data, Effect } from "effect"
import {
  type TextGridReadError,
  type TextGridUnsupportedInputError,
  makeReadError,
  makeUnsupportedInputError,
} from "./textgrid-errors"

export type TextGridInput = Data.TaggedEnum<{
  /** File on disk */
  Path: { readonly path: string }
  /** The complete document as a string */
  Text: { readonly text: string }
  /** The complete document as raw bytes */
  Bytes: { readonly bytes: Uint8Array }
  /** An open readable stream, read to its end */
  Stream: { readonly stream: Readable }
}>

export const TextGridInput = Data.taggedEnum<TextGridInput>()

/**
 * Decode TextGrid bytes: UTF-16 LE/BE when a byte-order mark says so,
 * UTF-8 otherwise. A leading UTF-8 BOM is dropped.
 */
export function decodeTextGridBytes(bytes: Uint8Array): string {
  const buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength)

  if (buffer[0] === 0xff && buffer[1] === 0xfe) {
    return buffer.subarray(2).toString("utf16le")
  }

  if (buffer[0] === 0xfe && buffer[1] === 0xff) {
    // Node has no utf16be decoder: swap each byte pair and decode as LE.
    // swap16 needs an even length, a dangling odd byte is dropped.
    const evenLength = (buffer.length - 2) & ~1
    const swapped = Buffer.from(buffer.subarray(2, 2 + evenLength))
    swapped.swap16()
    return swapped.toString("utf16le")
  }

  if (buffer[0] === 0xef && buffer[1] === 0xbb && buffer[2] === 0xbf) {
    return buffer.subarray(3).toString("utf8")
  }

  return buffer.toString("utf8")
}

/** Short description of an arbitrary value for error messages */
export function describeInput(input: unknown): string {
  if (input === null) return "null"
  if (typeof input !== "object") return typeof input
  if ("_tag" in input && typeof input._tag === "string") return `object tagged "${input._tag}"`
  return input.constructor?.name ?? "object"
}

function isTextGridInput(input: unknown): input is TextGridInput {
  if (typeof input !== "object" || input === null || !("_tag" in input)) return false
  switch (input._tag) {
    case "Path":
      return "path" in input && typeof input.path === "string"
    case "Text":
      return "text" in input && typeof input.text === "string"
    case "Bytes":
      return "bytes" in input && input.bytes instanceof Uint8Array
    case "Stream":
      return (
        "stream" in input &&
        typeof input.stream === "object" &&
        input.stream !== null &&
        Symbol.asyncIterator in input.stream
      )
    default:
      return false
  }
}

/**
 * Check the input representation without reading anything.
 *
 * A bare string is taken as the document itself.
 */
export const resolveTextGridInput = (
  input: unknown,
): Effect.Effect<TextGridInput, TextGridUnsupportedInputError> => {
  if (typeof input === "string") return Effect.succeed(TextGridInput.Text({ text: input }))
  if (isTextGridInput(input)) return Effect.succeed(input)
  return Effect.fail(makeUnsupportedInputError(describeInput(input)))
}

/** Stream chunks are Buffers, plain Uint8Arrays or, in object mode, strings */
function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength)
  }
  return Buffer.from(String(chunk), "utf8")
}

const readStream = (stream: Readable): Effect.Effect<string, TextGridReadError> =>
  Effect.tryPromise({
    try: async () => {
      const chunks: Buffer[] = []
      for await (const chunk of stream) {
        chunks.push(toBuffer(chunk))
      }
      return decodeTextGridBytes(Buffer.concat(chunks))
    },
    catch: cause => makeReadError("stream", cause),
  })

/**
 * Read a validated input to text.
 */
export const readTextGridSource = (
  input: TextGridInput,
): Effect.Effect<string, TextGridReadError> =>
  TextGridInput.$match(input, {
    Path: ({ path }) =>
      Effect.tryPromise({
        try: () => readFile(path),
        catch: cause => makeReadError(path, cause),
      }).pipe(Effect.map(decodeTextGridBytes)),
    Text: ({ text }) => Effect.succeed(text),
    Bytes: ({ bytes }) => Effect.sync(() => decodeTextGridBytes(bytes)),
    Stream: ({ stream }) => readStream(stream),
  })
