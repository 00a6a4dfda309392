/**
 * Output sink service.
 *
 * Serialization never touches the file system itself: sections and documents
 * write text chunks to whatever `InpSink` is provided. The caller owns the
 * underlying writer and closes it after the write completes.
 *
 * @since 0.1.0
 */

import { Context, Effect, Layer, Ref } from "effect"

/**
 * Anything accepting text chunks, such as a Node.js write stream.
 *
 * @category Models
 * @since 0.1.0
 */
export interface TextWriter {
  readonly write: (chunk: string) => unknown
}

/**
 * @category Services
 * @since 0.1.0
 */
export interface InpSinkService {
  readonly write: (chunk: string) => Effect.Effect<void>
}

/**
 * Destination of the assembled input file.
 *
 * @category Services
 * @since 0.1.0
 * @example
 * ```ts
 * const program = assembleInp(document).pipe(
 *   Effect.provide(InpSink.fromWriter(fs.createWriteStream("model.inp")))
 * )
 * ```
 */
export class InpSink extends Context.Tag("effect-stormwater-inp/InpSink")<InpSink, InpSinkService>() {
  /**
   * Sink forwarding every chunk to `writer`.
   */
  static fromWriter(writer: TextWriter): Layer.Layer<InpSink> {
    return Layer.succeed(this, {
      write: (chunk: string) =>
        Effect.sync(() => {
          writer.write(chunk)
        }),
    })
  }
}

/**
 * Runs `effect` against an in-memory sink and returns everything it wrote.
 *
 * @category Combinators
 * @since 0.1.0
 */
export const captureOutput = <A, E, R>(
  effect: Effect.Effect<A, E, R>,
): Effect.Effect<string, E, Exclude<R, InpSink>> =>
  Effect.gen(function* () {
    const buffer = yield* Ref.make<ReadonlyArray<string>>([])
    yield* Effect.provideService(effect, InpSink, {
      write: (chunk: string) => Ref.update(buffer, (chunks) => [...chunks, chunk]),
    })
    const chunks = yield* Ref.get(buffer)
    return chunks.join("")
  })
