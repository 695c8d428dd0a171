// CRC-32C (Castagnoli), reflected polynomial 0x82f63b78.
const TABLE = (() => {
  const table = new Uint32Array(256)
  for (let n = 0; n < 256; n++) {
    let c = n
    for (let k = 0; k < 8; k++) {
      c = c & 1 ? (c >>> 1) ^ 0x82f63b78 : c >>> 1
    }
    table[n] = c >>> 0
  }
  return table
})()

export const crc32c = (data: Buffer): number => {
  let crc = 0xffffffff
  for (const byte of data) {
    crc = TABLE[(crc ^ byte) & 0xff] ^ (crc >>> 8)
  }
  return (crc ^ 0xffffffff) >>> 0
}

// Checksum as it appears at the end of a bag of cells.
export const crc32cBytes = (data: Buffer): Buffer => {
  const result = Buffer.alloc(4)
  result.writeUInt32LE(crc32c(data))
  return result
}
