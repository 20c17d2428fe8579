import { XMLParser, XMLValidator } from 'fast-xml-parser'
import { promises as fs } from 'node:fs'
import { ElementType, PathElement } from '../types/elements'
import { Svg, XmlNode, isXmlNode } from '../types/svg'
import { ATTRIBUTE_PREFIX, PathReader, readAttribute } from './path'

export class SvgReadError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SvgReadError'
  }
}

function asNodeList(value: unknown): XmlNode[] {
  if (Array.isArray(value)) {
    return value.filter(isXmlNode)
  }
  return isXmlNode(value) ? [value] : []
}

export class SvgReader {
  private xmlParser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    isArray: (name) => name === ElementType.Path || name === ElementType.Group
  })

  private pathReader = new PathReader()

  private collectPaths(node: XmlNode): PathElement[] {
    // Direct paths first, then the contents of nested groups.
    const paths = asNodeList(node[ElementType.Path]).map((path) => this.pathReader.read(path))
    for (const group of asNodeList(node[ElementType.Group])) {
      paths.push(...this.collectPaths(group))
    }
    return paths
  }

  public readString(content: string): Svg {
    const validation = XMLValidator.validate(content)
    if (validation !== true) {
      throw new SvgReadError(`Invalid XML at line ${validation.err.line}: ${validation.err.msg}`)
    }

    const parsed: unknown = this.xmlParser.parse(content)
    const svg = isXmlNode(parsed) ? parsed['svg'] : undefined
    if (!isXmlNode(svg)) {
      throw new SvgReadError('No SVG element found')
    }

    return {
      paths: this.collectPaths(svg)
    }
  }

  public async readFile(filepath: string): Promise<Svg> {
    let content: string
    try {
      content = await fs.readFile(filepath, 'utf8')
    } catch (error) {
      throw new SvgReadError(
        `Failed to read Svg file ${filepath}: ${error instanceof Error ? error.message : error}`
      )
    }
    return this.readString(content)
  }
}
