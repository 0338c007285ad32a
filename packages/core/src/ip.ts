import { ReconcileError } from './errors.js'

// /16 is the widest block a single scope entry may expand to
const MIN_PREFIX = 16

export function ipToInt(ip: string): number {
  const parts = ip.trim().split('.')
  if (parts.length !== 4) throw new ReconcileError('INVALID_IP', `not an IPv4 address: ${ip}`)
  let out = 0
  for (const part of parts) {
    if (!/^\d{1,3}$/.test(part)) throw new ReconcileError('INVALID_IP', `not an IPv4 address: ${ip}`)
    const n = parseInt(part, 10)
    if (n > 255) throw new ReconcileError('INVALID_IP', `not an IPv4 address: ${ip}`)
    out = out * 256 + n
  }
  return out
}

export function intToIp(n: number): string {
  return [24, 16, 8, 0].map(shift => Math.floor(n / 2 ** shift) % 256).join('.')
}

function expandCidr(entry: string): number[] {
  const [base, bits] = entry.split('/')
  const prefix = Number(bits)
  if (!base || !Number.isInteger(prefix) || prefix < 0 || prefix > 32) {
    throw new ReconcileError('INVALID_IP', `not a CIDR block: ${entry}`)
  }
  if (prefix < MIN_PREFIX) {
    throw new ReconcileError('INVALID_SCOPE', `CIDR block ${entry} is wider than /${MIN_PREFIX}`)
  }
  const size = 2 ** (32 - prefix)
  const start = Math.floor(ipToInt(base) / size) * size
  return Array.from({ length: size }, (_, i) => start + i)
}

/** A set of IPv4 addresses kept as integers. Entries may be single addresses or CIDR blocks. */
export class IpSet implements Iterable<number> {
  private readonly ints = new Set<number>()

  constructor(entries: Iterable<string | number> = []) {
    for (const e of entries) this.add(e)
  }

  add(entry: string | number) {
    if (typeof entry === 'number') {
      this.ints.add(entry)
    } else if (entry.includes('/')) {
      for (const n of expandCidr(entry.trim())) this.ints.add(n)
    } else {
      this.ints.add(ipToInt(entry))
    }
  }

  has(ip: string | number): boolean {
    return this.ints.has(typeof ip === 'number' ? ip : ipToInt(ip))
  }

  get size() { return this.ints.size }

  difference(other: Iterable<number>): IpSet {
    const drop = new Set(other)
    const out = new IpSet()
    for (const n of this.ints) if (!drop.has(n)) out.add(n)
    return out
  }

  toArray(): number[] { return [...this.ints].sort((a, b) => a - b) }

  [Symbol.iterator](): Iterator<number> { return this.ints[Symbol.iterator]() }
}
