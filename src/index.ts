/**
 * @since 0.1.0
 */
export * from "./Errors.js"
export * from "./Vocabulary.js"
export * from "./Topology.js"
export * from "./Unsupported.js"
export * from "./Tabular.js"
export * from "./Meteo.js"
export * from "./Nodes.js"
export * from "./Catchment.js"
export * from "./Links.js"
export * from "./Shapes.js"
export * from "./Geometry.js"
export * from "./Gui.js"
export * from "./Header.js"
export * from "./Sink.js"
export * from "./Section.js"
export * from "./Document.js"
