const ILLEGAL = /[/\\?<>:*|"]/g
const CONTROL = /[\u0000-\u001f\u0080-\u009f]/g
const RESERVED = /^(con|prn|aux|nul|com[0-9]|lpt[0-9])(\..*)?$/i
const TRAILING = /[. ]+$/
const MAX_BYTES = 255

// Makes a single path segment out of a catalog value: separators and characters that are illegal on common
// filesystems become '_', trailing dots and spaces are dropped and the result fits in 255 bytes.
export function makeValidName(name: string): string {
  let out = name.replace(ILLEGAL, '_').replace(CONTROL, '_')
  out = out.replace(TRAILING, '')
  if (RESERVED.test(out)) {
    out = `_${out}`
  }
  return truncateBytes(out, MAX_BYTES)
}

function truncateBytes(value: string, maxBytes: number): string {
  if (Buffer.byteLength(value) <= maxBytes) {
    return value
  }
  let out = ''
  let size = 0
  for (const ch of value) {
    const len = Buffer.byteLength(ch)
    if (size + len > maxBytes) {
      break
    }
    out += ch
    size += len
  }
  return out
}
