export enum ElementType {
  Group = 'g',
  Path = 'path'
}

export interface PathElement {
  type: ElementType.Path
  id?: string
  d: string
}
