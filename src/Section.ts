/**
 * Section serializer.
 *
 * A section is one bracketed block of the input file: the `[NAME]` line, its
 * comment lines (usually a column header and a dashed underline) and the lines
 * rendered for each entry, in the order the caller supplied them. Entries are
 * trusted to be valid; validation already happened when they were built.
 *
 * @since 0.1.0
 */

import { Effect } from "effect"
import { captureOutput, InpSink } from "./Sink.js"

/**
 * Rendering rule of one section.
 *
 * @category Models
 * @since 0.1.0
 */
export interface Section<A> {
  readonly name: string
  readonly comments: ReadonlyArray<string>
  readonly render: (entry: A) => ReadonlyArray<string>
}

/**
 * A labelled fixed-width column.
 *
 * @category Models
 * @since 0.1.0
 */
export interface Column {
  readonly label: string
  readonly width: number
}

/**
 * @category Models
 * @since 0.1.0
 */
export interface ColumnCommentOptions {
  /** Ends both comment lines with the column separator. */
  readonly trailingSeparator?: boolean
}

/**
 * Header and underline comment lines for `columns`. The leading `;;` takes the
 * first two characters of the first column.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const columnComments = (
  columns: ReadonlyArray<Column>,
  options: ColumnCommentOptions = {},
): readonly [string, string] => {
  const cells = (cell: (column: Column) => string) =>
    columns.map((column, index) => cell(index === 0 ? { ...column, width: column.width - 2 } : column))
  const line = (parts: ReadonlyArray<string>) => `;;${parts.join(" ")}${options.trailingSeparator ? " " : ""}`
  return [
    line(cells((column) => column.label.padEnd(column.width))),
    line(cells((column) => "-".repeat(column.width))),
  ]
}

/**
 * Section with one line per entry under a column header.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const tabular = <A>(
  name: string,
  columns: ReadonlyArray<Column>,
  render: (entry: A) => string,
  options?: ColumnCommentOptions,
): Section<A> => ({
  name,
  comments: columnComments(columns, options),
  render: (entry) => [render(entry)],
})

/**
 * Writes `[NAME]`, the comment lines and the lines of every entry, each
 * terminated by a newline.
 *
 * @category Serialization
 * @since 0.1.0
 */
export const writeSection = <A>(section: Section<A>, entries: ReadonlyArray<A>): Effect.Effect<void, never, InpSink> =>
  Effect.gen(function* () {
    const sink = yield* InpSink
    const lines = [`[${section.name}]`, ...section.comments, ...entries.flatMap(section.render)]
    yield* sink.write(lines.map((line) => `${line}\n`).join(""))
    yield* Effect.logDebug("section written")
  }).pipe(Effect.annotateLogs({ section: section.name, entries: entries.length }))

/**
 * Renders a single section to a string.
 *
 * @category Serialization
 * @since 0.1.0
 */
export const renderSection = <A>(section: Section<A>, entries: ReadonlyArray<A>): string =>
  Effect.runSync(captureOutput(writeSection(section, entries)))
