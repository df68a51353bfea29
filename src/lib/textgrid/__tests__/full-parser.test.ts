import { Effect } from "effect"
import { describe, expect, test } from "vitest"
import { parseFullTextGrid } from "../full-parser"
import { tokenize } from "../lexer"

const parseEffect = (text: string) =>
  tokenize(text, "full").pipe(Effect.flatMap(parseFullTextGrid))

const parse = (text: string) => Effect.runSync(parseEffect(text))

const parseError = (text: string) => Effect.runSync(Effect.flip(parseEffect(text)))

const HEADER = `File type = "ooTextFile"
Object class = "TextGrid"

xmin = 0
xmax = 2.3
tiers? <exists>
size = 1
item []:
`

describe("parseFullTextGrid", () => {
  test("parses a single interval tier", () => {
    const result = parse(`${HEADER}
    item [1]:
        class = "IntervalTier"
        name = "sentence"
        xmin = 0
        xmax = 2.3
        intervals: size = 1
        intervals [1]:
            xmin = 0
            xmax = 2.3
            text = "hello"
`)

    expect(result.header).toEqual({ size: 1, xmin: 0, xmax: 2.3, hasTiers: true })
    expect(result.tierHeaders).toEqual([{ name: "sentence", xmin: 0, xmax: 2.3, size: 1 }])
    expect(result.tiers).toEqual([
      {
        _tag: "IntervalTier",
        name: "sentence",
        intervals: [{ start: 0, end: 2.3, text: "hello" }],
      },
    ])
  })

  test("parses a text tier", () => {
    const result = parse(`${HEADER}
    item [1]:
        class = "TextTier"
        name = "bell"
        xmin = 0
        xmax = 2.3
        points: size = 2
        points [1]:
            number = 0.9
            mark = "ding"
        points [2]:
            number = 2
            mark = "dong"
`)

    expect(result.tiers).toEqual([
      {
        _tag: "TextTier",
        name: "bell",
        points: [
          { number: 0.9, mark: "ding" },
          { number: 2, mark: "dong" },
        ],
      },
    ])
  })

  test("reads property groups by key in any order", () => {
    const result = parse(`${HEADER}
    item [1]:
        class = "IntervalTier"
        xmax = 2.3
        name = "words"
        xmin = 0
        intervals: size = 1
        intervals [1]:
            text = "hi"
            xmax = 1.5
            xmin = 0.5
`)

    expect(result.tierHeaders[0]).toEqual({ name: "words", xmin: 0, xmax: 2.3, size: 1 })
    expect(result.tiers[0]).toEqual({
      _tag: "IntervalTier",
      name: "words",
      intervals: [{ start: 0.5, end: 1.5, text: "hi" }],
    })
  })

  test("ignores unknown keys and keeps the last of a repeated key", () => {
    const result = parse(`${HEADER}
    item [1]:
        class = "IntervalTier"
        name = "draft"
        name = "final"
        xmin = 0
        xmax = 2.3
        speaker = "A"
        intervals: size = 0
`)

    expect(result.tiers[0]?.name).toBe("final")
  })

  test("does not check header indices against positions", () => {
    const result = parse(`${HEADER}
    item [7]:
        class = "IntervalTier"
        name = "a"
        xmin = 0
        xmax = 1
        intervals: size = 1
        intervals [42]:
            xmin = 0
            xmax = 1
            text = "x"
`)

    expect(result.tiers).toHaveLength(1)
  })

  test("keeps intervals in declaration order", () => {
    const result = parse(`${HEADER}
    item [1]:
        class = "IntervalTier"
        name = "a"
        xmin = 0
        xmax = 2
        intervals: size = 2
        intervals [1]:
            xmin = 1
            xmax = 2
            text = "late"
        intervals [2]:
            xmin = 0
            xmax = 1
            text = "early"
`)

    const tier = result.tiers[0]
    expect(tier?._tag === "IntervalTier" && tier.intervals.map(i => i.text)).toEqual([
      "late",
      "early",
    ])
  })

  test("accepts tier class strings as label text", () => {
    const result = parse(`${HEADER}
    item [1]:
        class = "IntervalTier"
        name = "TextTier"
        xmin = 0
        xmax = 1
        intervals: size = 1
        intervals [1]:
            xmin = 0
            xmax = 1
            text = "IntervalTier"
`)

    expect(result.tiers[0]).toEqual({
      _tag: "IntervalTier",
      name: "TextTier",
      intervals: [{ start: 0, end: 1, text: "IntervalTier" }],
    })
  })

  test("leaves undeclared header fields undefined", () => {
    const result = parse("item []:")
    expect(result.header).toEqual({
      size: undefined,
      xmin: undefined,
      xmax: undefined,
      hasTiers: undefined,
    })
    expect(result.tiers).toEqual([])
  })

  test("reads tiers? <absent> as no tiers", () => {
    const result = parse("tiers? <absent>\nsize = 0\nitem []:")
    expect(result.header.hasTiers).toBe(false)
  })

  test("fails on a missing interval property at end of input", () => {
    const error = parseError(`${HEADER}
    item [1]:
        class = "IntervalTier"
        name = "a"
        xmin = 0
        xmax = 1
        intervals: size = 1
        intervals [1]:
            xmin = 0
            xmax = 1
`)

    expect(error._tag).toBe("TextGridSyntaxError")
    if (error._tag !== "TextGridSyntaxError") return
    expect(error.token).toBeUndefined()
    expect(error.expected).toBe('property "text" in interval')
    expect(error.message).toBe('Unexpected end of input: expected property "text" in interval')
  })

  test("locates a missing tier header property at the size line", () => {
    const error = parseError(`${HEADER}
    item [1]:
        class = "IntervalTier"
        name = "a"
        xmax = 1
        intervals: size = 0
`)

    if (error._tag !== "TextGridSyntaxError") throw new Error(`unexpected ${error._tag}`)
    expect(error.expected).toBe('property "xmin" in tier header')
    expect(error.token?.type).toBe("INTERVALS")
    expect(error.token?.line).toBe(14)
  })

  test("fails on a string where a number is required", () => {
    const error = parseError('xmin = "zero"\nitem []:')

    if (error._tag !== "TextGridSyntaxError") throw new Error(`unexpected ${error._tag}`)
    expect(error.expected).toBe('a number for "xmin"')
    expect(error.token).toEqual({ type: "STRING", value: "zero", offset: 7, line: 1 })
    expect(error.message).toBe(
      'Unexpected STRING "zero" at line 1, offset 7: expected a number for "xmin"',
    )
  })

  test("fails when an interval tier declares points", () => {
    const error = parseError(`${HEADER}
    item [1]:
        class = "IntervalTier"
        name = "a"
        xmin = 0
        xmax = 1
        points: size = 0
`)

    if (error._tag !== "TextGridSyntaxError") throw new Error(`unexpected ${error._tag}`)
    expect(error.expected).toBe("INTERVALS")
    expect(error.token?.type).toBe("POINTS")
  })

  test("fails without the item list", () => {
    const error = parseError("xmin = 0\nxmax = 1\nsize = 0\n")

    if (error._tag !== "TextGridSyntaxError") throw new Error(`unexpected ${error._tag}`)
    expect(error.expected).toBe("ITEM")
    expect(error.token).toBeUndefined()
  })

  test("fails on trailing tokens", () => {
    const error = parseError("item []:\n5")

    if (error._tag !== "TextGridSyntaxError") throw new Error(`unexpected ${error._tag}`)
    expect(error.expected).toBe("end of input")
    expect(error.token).toEqual({ type: "INT", value: "5", offset: 9, line: 2 })
  })

  test("propagates lexical errors", () => {
    const error = parseError("xmin = 0 @")
    expect(error._tag).toBe("TextGridLexicalError")
  })
})
