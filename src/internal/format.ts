/**
 * Fixed-column formatting primitives. Every field of a section line is
 * left-justified into its width and separated from the next by one space.
 */

/** Left-justifies `text` into `width` characters, never truncating. */
export const pad = (text: string, width: number): string => text.padEnd(width)

/** Blank field of `width` characters. */
export const blank = (width: number): string => " ".repeat(width)

/**
 * Fixed decimals with exact ties rounded to even. `toFixed` alone rounds a tie
 * away from zero, so `0.125` would become `0.13` instead of `0.12`.
 */
export const toFixedEven = (value: number, precision: number): string => {
  const rounded = value.toFixed(precision)
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) {
    return rounded
  }
  const digits = Math.abs(value).toFixed(100)
  const point = digits.indexOf(".")
  if (!/^50*$/.test(digits.slice(point + 1 + precision))) {
    return rounded
  }
  const truncated = digits.slice(0, precision === 0 ? point : point + 1 + precision)
  if (Number(truncated.charAt(truncated.length - 1)) % 2 === 1) {
    return rounded
  }
  return value < 0 ? `-${truncated}` : truncated
}

/** Number with `precision` fixed decimals, left-justified into `width`. */
export const fixed = (value: number, width: number, precision: number): string =>
  pad(toFixedEven(value, precision), width)

/** Optional number: fixed decimals when present, otherwise a blank field. */
export const fixedOrBlank = (value: number | undefined, width: number, precision: number): string =>
  value === undefined ? blank(width) : fixed(value, width, precision)

/**
 * Plain decimal with at least one fractional digit: `0` becomes `0.0` and
 * `0.25` stays `0.25`.
 */
export const decimal = (value: number): string => (Number.isInteger(value) ? value.toFixed(1) : String(value))

/** Integer count or flag, written without decimals. */
export const integer = (value: number): string => String(value)

/** Text value, written as-is or as a decimal when numeric. */
export const textOrDecimal = (value: string | number): string =>
  typeof value === "number" ? decimal(value) : value

/** Quotes a file name that contains whitespace. */
export const quoted = (fileName: string): string => (/\s/.test(fileName) ? `"${fileName}"` : fileName)

// Whitespace runs, "--" dashes between words, and words split after a hyphen
// that has two letters before it and a letter after it.
const CHUNK =
  /( +|(?<=[\p{L}\p{N}_!"'&.,?])-{2,}(?=[\p{L}\p{N}_])|[^ ]+?(?:-(?:(?<=[\p{L}_]{2}-)|(?<=[\p{L}_]-[\p{L}_]-))(?=[\p{L}_]-?[\p{L}_])|(?= |$)|(?<=[\p{L}\p{N}_!"'&.,?])(?=-{2,}[\p{L}\p{N}_])))/u

const isBlank = (chunk: string): boolean => chunk.trim().length === 0

/**
 * Greedy wrap into lines of at most `width` characters. Lines break at
 * whitespace or after a hyphen inside a word. Whitespace is dropped where a
 * line ends or a continuation line starts. A chunk longer than `width` fills
 * what is left of the current line and carries on, preferring to split after
 * a hyphen.
 */
export const wrap = (text: string, width: number): ReadonlyArray<string> => {
  const chunks = text
    .replace(/[\t\n\v\f\r]/g, " ")
    .split(CHUNK)
    .filter((chunk) => chunk.length > 0)
    .reverse()
  const lines: Array<string> = []
  while (chunks.length > 0) {
    const line: Array<string> = []
    let length = 0
    if (lines.length > 0 && isBlank(chunks[chunks.length - 1] ?? "")) {
      chunks.pop()
    }
    while (chunks.length > 0) {
      const next = chunks[chunks.length - 1] ?? ""
      if (length + next.length > width) {
        break
      }
      line.push(next)
      length += next.length
      chunks.pop()
    }
    const long = chunks[chunks.length - 1]
    if (long !== undefined && long.length > width) {
      const room = width < 1 ? 1 : width - length
      const hyphen = long.lastIndexOf("-", room - 1)
      const end = long.length > room && hyphen > 0 && /[^-]/.test(long.slice(0, hyphen)) ? hyphen + 1 : room
      line.push(long.slice(0, end))
      chunks[chunks.length - 1] = long.slice(end)
    }
    if (line.length > 0 && isBlank(line[line.length - 1] ?? "")) {
      line.pop()
    }
    if (line.length > 0) {
      lines.push(line.join(""))
    }
  }
  return lines
}

/** Splits `items` into consecutive batches of `size`; the last may be shorter. */
export const batched = <A>(items: ReadonlyArray<A>, size: number): ReadonlyArray<ReadonlyArray<A>> => {
  const batches: Array<ReadonlyArray<A>> = []
  for (let start = 0; start < items.length; start += size) {
    batches.push(items.slice(start, start + size))
  }
  return batches
}
