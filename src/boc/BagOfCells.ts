import { Cell } from '../cell/Cell'
import { rethrowAs, TonError } from '../errors'
import { moduleLogger } from '../logger'
import { parseRawBoc, RawBagOfCells, RawCell, serializeRawBoc, SerializeOptions } from './RawBagOfCells'

const log = moduleLogger('boc')

const hashKey = (cell: Cell) => cell.hash().toString('hex')

// Depth-first post-order, refs visited last-to-first, roots last-to-first. Reversed, this puts
// the first root at index 0 and every child after its parents.
const postOrder = (roots: readonly Cell[]): Cell[] => {
  const visited = new Set<string>()
  const order: Cell[] = []
  for (let r = roots.length - 1; r >= 0; r--) {
    const root = roots[r]
    if (visited.has(hashKey(root))) continue
    visited.add(hashKey(root))
    const stack = [{ cell: root, next: root.refs.length - 1 }]
    while (stack.length > 0) {
      const top = stack[stack.length - 1]
      if (top.next < 0) {
        order.push(top.cell)
        stack.pop()
        continue
      }
      const child = top.cell.refs[top.next--]
      const key = hashKey(child)
      if (!visited.has(key)) {
        visited.add(key)
        stack.push({ cell: child, next: child.refs.length - 1 })
      }
    }
  }
  return order
}

const toRaw = (roots: readonly Cell[]): RawBagOfCells => {
  const sorted = postOrder(roots).reverse()
  const indices = new Map<string, number>()
  sorted.forEach((cell, index) => indices.set(hashKey(cell), index))
  const indexOf = (cell: Cell): number => {
    const index = indices.get(hashKey(cell))
    if (index === undefined) {
      throw new TonError('MalformedBoc', `cell ${hashKey(cell)} missing from the bag`)
    }
    return index
  }
  const cells: RawCell[] = sorted.map((cell) => ({
    data: cell.bits,
    bitLength: cell.bitLength,
    refs: cell.refs.map(indexOf),
    exotic: cell.isExotic,
    levelMask: cell.levelMask.mask,
  }))
  return { cells, roots: roots.map(indexOf) }
}

const fromRaw = (raw: RawBagOfCells): Cell[] => {
  const built: Cell[] = new Array(raw.cells.length)
  for (let i = raw.cells.length - 1; i >= 0; i--) {
    const { data, bitLength, refs, exotic, levelMask } = raw.cells[i]
    built[i] = rethrowAs('MalformedBoc', `cell ${i}`, () => {
      const cell = new Cell({ data, bitLength, refs: refs.map((ref) => built[ref]), exotic })
      if (cell.levelMask.mask !== levelMask) {
        throw new TonError('MalformedBoc', `declared level mask ${levelMask}, contents give ${cell.levelMask.mask}`)
      }
      return cell
    })
  }
  return raw.roots.map((root) => built[root])
}

/**
 * Ordered list of root cells and their canonical serialized form. Shared subtrees are written once;
 * identity is the cell hash.
 */
export class BagOfCells {
  private readonly rootList: Cell[]

  constructor(roots: readonly Cell[] = []) {
    this.rootList = [...roots]
  }

  static fromRoot(root: Cell): BagOfCells {
    return new BagOfCells([root])
  }

  static parse(serial: Buffer): BagOfCells {
    const raw = parseRawBoc(serial)
    log.debug({ bytes: serial.length, cells: raw.cells.length, roots: raw.roots.length }, 'parsed bag of cells')
    return new BagOfCells(fromRaw(raw))
  }

  static parseHex(hex: string): BagOfCells {
    if (!/^([0-9a-fA-F]{2})*$/.test(hex)) {
      throw new TonError('MalformedBoc', 'not a hex string')
    }
    return BagOfCells.parse(Buffer.from(hex, 'hex'))
  }

  // Standard or url-safe alphabet.
  static parseBase64(base64: string): BagOfCells {
    if (!/^[A-Za-z0-9+/_-]*={0,2}$/.test(base64)) {
      throw new TonError('MalformedBoc', 'not a base64 string')
    }
    return BagOfCells.parse(Buffer.from(base64, 'base64'))
  }

  get roots(): readonly Cell[] {
    return this.rootList
  }

  addRoot(root: Cell): this {
    this.rootList.push(root)
    return this
  }

  root(index: number): Cell {
    const cell = this.rootList[index]
    if (cell === undefined) {
      throw new TonError('InvalidArgument', `no root ${index}, bag has ${this.rootList.length}`)
    }
    return cell
  }

  singleRoot(): Cell {
    if (this.rootList.length !== 1) {
      throw new TonError('MalformedBoc', `expected exactly one root, got ${this.rootList.length}`)
    }
    return this.rootList[0]
  }

  serialize(options: SerializeOptions = {}): Buffer {
    if (this.rootList.length === 0) {
      throw new TonError('InvalidArgument', "can't serialize a bag without roots")
    }
    const raw = toRaw(this.rootList)
    const serial = serializeRawBoc(raw, options)
    log.debug({ bytes: serial.length, cells: raw.cells.length, roots: raw.roots.length, ...options }, 'serialized bag of cells')
    return serial
  }

  toHex(options: SerializeOptions = {}): string {
    return this.serialize(options).toString('hex')
  }

  toBase64(options: SerializeOptions = {}): string {
    return this.serialize(options).toString('base64')
  }
}
