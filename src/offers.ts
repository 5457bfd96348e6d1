import _ from 'lodash'
import * as log from './log'
import { Arch, InstanceOffer } from './interfaces'

// The advisor has renamed its output fields between releases.
const FIELD_KEYS = {
  instanceType: ['instanceTypeId', 'instance_type', 'InstanceType'],
  zoneId: ['zoneId', 'zone_id', 'ZoneId'],
  pricePerCore: [
    'pricePerCore',
    'price_per_core',
    'PricePerCore',
    'price',
    'Price'
  ],
  cpuCores: ['cpuCoreCount', 'cpu_cores', 'CpuCores', 'cores', 'Cores'],
  memorySize: ['memorySize', 'memory_size', 'MemorySize', 'memory', 'Memory']
} as const

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function fieldValue(
  record: Record<string, unknown>,
  keys: readonly string[]
): string | undefined {
  const key = _.find(keys, k => record[k] !== undefined && record[k] !== null)
  if (key === undefined) return undefined
  const value = String(record[key]).trim()
  return value === '' ? undefined : value
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || !/^[+-]?\d+$/.test(value)) return undefined
  return Number(value)
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined) return undefined
  const parsed = Number(value)
  return Number.isFinite(parsed) ? parsed : undefined
}

/**
 * Derives the vCPU count from an ECS instance type name,
 * e.g. `ecs.c7.2xlarge` -> 8.
 */
export function parseCpuFromInstanceType(
  instanceType: string
): number | undefined {
  const match = /\.(\d+)xlarge$/.exec(instanceType)
  if (match) {
    return Number(match[1]) * 4
  }
  if (instanceType.endsWith('.xlarge')) return 4
  if (instanceType.endsWith('.large')) return 2
  if (instanceType.endsWith('.medium')) return 2
  return undefined
}

export function memoryRatio(arch: Arch): number {
  return arch === 'arm64' ? 2 : 1
}

export function normalizeOffer(
  raw: unknown,
  arch: Arch
): InstanceOffer | undefined {
  if (!isRecord(raw)) return undefined

  const instanceType = fieldValue(raw, FIELD_KEYS.instanceType)
  const zoneId = fieldValue(raw, FIELD_KEYS.zoneId)
  const price = fieldValue(raw, FIELD_KEYS.pricePerCore)
  if (!instanceType || !zoneId || !price) return undefined

  const pricePerCore = parseNumber(price)
  if (pricePerCore === undefined || pricePerCore <= 0) return undefined

  const cpuCores =
    parseInteger(fieldValue(raw, FIELD_KEYS.cpuCores)) ??
    parseCpuFromInstanceType(instanceType)
  if (cpuCores === undefined) {
    log.warning(
      `Could not determine CPU cores from instance type ${instanceType}, skipping`
    )
    return undefined
  }

  const memory = parseNumber(fieldValue(raw, FIELD_KEYS.memorySize))
  const memorySize =
    memory !== undefined ? Math.trunc(memory) : cpuCores * memoryRatio(arch)

  return { instanceType, zoneId, pricePerCore, cpuCores, memorySize }
}

export function filterOffers(
  offers: InstanceOffer[],
  minCpu: number,
  minMem: number
): InstanceOffer[] {
  return _.filter(offers, offer => {
    if (offer.cpuCores < minCpu || offer.memorySize < minMem) {
      log.info(
        `Skipping instance ${offer.instanceType} (${offer.cpuCores}c${offer.memorySize}g) - ` +
          `below minimum requirements (${minCpu}c${minMem}g)`
      )
      return false
    }
    return true
  })
}
