export const MAX_LEVEL = 3

const popcount = (value: number): number => {
  let count = 0
  for (let v = value; v !== 0; v >>= 1) count += v & 1
  return count
}

export class LevelMask {
  readonly level: number
  readonly hashIndex: number
  readonly hashCount: number

  constructor(readonly mask: number = 0) {
    this.level = mask === 0 ? 0 : 32 - Math.clz32(mask)
    this.hashIndex = popcount(mask)
    this.hashCount = this.hashIndex + 1
  }

  // Mask restricted to levels below `level`.
  apply(level: number): LevelMask {
    return new LevelMask(this.mask & ((1 << level) - 1))
  }

  isSignificant(level: number): boolean {
    return level === 0 || ((this.mask >> (level - 1)) & 1) !== 0
  }

  or(other: LevelMask): LevelMask {
    return new LevelMask(this.mask | other.mask)
  }

  shiftRight(): LevelMask {
    return new LevelMask(this.mask >> 1)
  }
}
