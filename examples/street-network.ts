import { Effect } from "effect"
import {
  assembleInp,
  Circular,
  CurbInlet,
  GrateInlet,
  InpSink,
  makeConduit,
  makeInlet,
  makeInletUsage,
  makeJunction,
  makeOptions,
  makeOutfall,
  makeStreet,
  makeXSection,
  StreetShape,
  Title,
  verifyDocument,
} from "../src/index.js"

const program = Effect.gen(function* () {
  const street = yield* makeStreet({
    name: "street1",
    crownWidth: 6,
    curbHeight: 0.5,
    crossSlope: 2,
    roadRoughness: 0.016,
  })
  const j1 = yield* makeJunction({ name: "j1", elevation: 100, maxDepth: 3 })
  const j2 = yield* makeJunction({ name: "j2", elevation: 99.5, maxDepth: 3 })
  const out1 = yield* makeOutfall({ name: "out1", elevation: 98 })
  const gutter = yield* makeConduit({ name: "gutter", fromNode: j1, toNode: j2, length: 120, roughness: 0.016 })
  const pipe = yield* makeConduit({ name: "pipe", fromNode: j2, toNode: out1, length: 60, roughness: 0.013 })
  const grate = yield* makeInlet({ name: "grate", design: GrateInlet.make({ length: 2, width: 0.75, grateType: "P_BAR-50" }) })
  const curb = yield* makeInlet({
    name: "curb",
    design: CurbInlet.make({ length: 1.5, height: 0.5, throatAngle: "INCLINED" }),
  })

  const document = yield* verifyDocument({
    title: new Title({ header: "Street drainage", description: "A gutter feeding a pipe through two inlets" }),
    options: yield* makeOptions({ flowUnits: "CMS", routingStep: 10 }),
    junctions: [j1, j2],
    outfalls: [out1],
    conduits: [gutter, pipe],
    xsections: [
      yield* makeXSection({ link: gutter, shape: StreetShape.make({ street }) }),
      yield* makeXSection({ link: pipe, shape: Circular.make({ diameter: 0.6 }) }),
    ],
    streets: [street],
    inlets: [grate, curb],
    inletUsages: [
      yield* makeInletUsage({ conduit: gutter, inlet: grate, node: j2, percentClogged: 10 }),
      yield* makeInletUsage({ conduit: gutter, inlet: curb, node: j2 }),
    ],
  })

  yield* assembleInp(document)
}).pipe(Effect.provide(InpSink.fromWriter(process.stdout)))

Effect.runPromise(program).catch((error) => {
  console.error("Failed to write the street network", error)
  process.exitCode = 1
})
