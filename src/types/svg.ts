import { PathElement } from './elements'

// Representation of an SVG doc, reduced to the paths we measure.
export type Svg = {
  paths: PathElement[]
}

// A parsed XML element: attributes under '@_' keys, children under their tag names.
export type XmlNode = Record<string, unknown>

export function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
