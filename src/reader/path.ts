import { ElementType, PathElement } from '../types/elements'
import { XmlNode } from '../types/svg'

export class PathReadError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'PathReadError'
  }
}

export const ATTRIBUTE_PREFIX = '@_'

export function readAttribute(node: XmlNode, name: string): string | undefined {
  const value = node[ATTRIBUTE_PREFIX + name]
  return typeof value === 'string' ? value : undefined
}

export class PathReader {
  public read(node: XmlNode): PathElement {
    const id = readAttribute(node, 'id')
    const d = readAttribute(node, 'd')
    if (d === undefined || d.trim().length === 0) {
      throw new PathReadError(`Path element${id ? ` "${id}"` : ''} missing "d" attribute`)
    }

    return {
      type: ElementType.Path,
      id,
      d
    }
  }
}
