import { describe, expect, it } from '@jest/globals'
import path from 'path'
import { SvgReader, SvgReadError } from '../src/reader/base'
import { PathReadError } from '../src/reader/path'
import { ElementType } from '../src/types/elements'

const dataDir = path.join(__dirname, 'data')

describe('SvgReader', () => {
  const reader = new SvgReader()

  it('collects paths from the root and nested groups', async () => {
    const svg = await reader.readFile(path.join(dataDir, 'paths.svg'))

    expect(svg).toEqual({
      paths: [
        { type: ElementType.Path, id: 'arch', d: 'M0 0 Q1 2 2 0' },
        { type: ElementType.Path, id: undefined, d: 'M0 0 L10 0' },
        { type: ElementType.Path, id: 'nested', d: 'M0 0 C0 1 1 1 1 0' }
      ]
    })
  })

  it('reads documents with an XML declaration', async () => {
    const svg = await reader.readFile(path.join(dataDir, 'sized.svg'))

    expect(svg.paths.map((element) => element.id)).toEqual(['dot', 'edge'])
  })

  it('rejects a path without path data', async () => {
    await expect(reader.readFile(path.join(dataDir, 'missing_d.svg'))).rejects.toThrow(
      'Path element "blank" missing "d" attribute'
    )
    await expect(reader.readFile(path.join(dataDir, 'missing_d.svg'))).rejects.toThrow(
      PathReadError
    )
  })

  it('rejects documents without an svg root', () => {
    expect(() => reader.readString('<html><body/></html>')).toThrow('No SVG element found')
  })

  it('rejects malformed XML', () => {
    expect(() => reader.readString('<svg><path d="M0 0"></svg>')).toThrow(SvgReadError)
  })

  it('wraps file system errors', async () => {
    await expect(reader.readFile(path.join(dataDir, 'does_not_exist.svg'))).rejects.toThrow(
      'Failed to read Svg file'
    )
  })
})
