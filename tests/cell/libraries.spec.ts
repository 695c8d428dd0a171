import { BagOfCells } from '../../src/boc/BagOfCells'
import { Cell } from '../../src/cell/Cell'
import { beginCell } from '../../src/cell/CellBuilder'
import { libraryHashes } from '../../src/cell/libraries'

const libraryCell = (hash: Buffer) =>
  new Cell({ data: Buffer.concat([Buffer.from([2]), hash]), bitLength: 264, exotic: true })

const first = Buffer.alloc(32, 0xaa)
const second = Buffer.alloc(32, 0xbb)

describe('libraryHashes', () => {
  it('collects each referenced library once in breadth-first order', () => {
    const inner = beginCell().storeUint(1, 8).storeRef(libraryCell(first)).storeRef(libraryCell(second)).build()
    const root = beginCell().storeRef(inner).storeRef(libraryCell(second)).build()
    const parsed = BagOfCells.parse(BagOfCells.fromRoot(root).serialize()).singleRoot()
    expect(libraryHashes([parsed]).map((hash) => hash.toString('hex'))).toEqual([
      second.toString('hex'),
      first.toString('hex'),
    ])
  })

  it('finds a library used as the code cell itself', () => {
    expect(libraryHashes([libraryCell(first)])).toEqual([first])
  })

  it('returns nothing for ordinary trees', () => {
    const tree = beginCell().storeRef(beginCell().storeUint(2, 8).build()).build()
    expect(libraryHashes([tree, Cell.EMPTY])).toEqual([])
  })
})
