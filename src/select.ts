import _ from 'lodash'
import * as log from './log'
import {
  AdvisorWorker,
  Arch,
  Candidate,
  ISelectParams,
  InstanceOffer,
  SearchStrategy
} from './interfaces'
import { filterOffers, normalizeOffer } from './offers'

export const MAX_CANDIDATES = 5
export const SPOT_PRICE_MARGIN = 1.2

export interface SelectionResult {
  primary: Candidate
  primaryOffer: InstanceOffer
  candidates: Candidate[]
}

export function buildStrategies(
  arch: Arch,
  minCpu: number,
  maxCpu: number
): SearchStrategy[] {
  const strategies: SearchStrategy[] = []
  if (arch === 'amd64') {
    strategies.push({ cpu: minCpu, mem: minCpu, exact: true, label: '1:1' })
    if (minCpu <= 32) {
      strategies.push({
        cpu: minCpu,
        mem: minCpu * 2,
        exact: true,
        label: '1:2'
      })
    }
    if (minCpu < 16) {
      strategies.push({ cpu: 16, mem: 16, exact: true, label: '1:1' })
      strategies.push({ cpu: 16, mem: 32, exact: true, label: '1:2' })
    }
  } else {
    strategies.push({
      cpu: minCpu,
      mem: minCpu * 2,
      exact: true,
      label: '1:2'
    })
  }
  strategies.push({ cpu: minCpu, mem: maxCpu, exact: false, label: 'range' })
  return strategies
}

/**
 * Maps a zone such as `cn-hangzhou-k` to the VSwitch configured for its
 * suffix letter (`ALIYUN_VSWITCH_ID_K`).
 */
export function resolveVSwitchId(
  zoneId: string,
  vswitchIds: Record<string, string>
): string | undefined {
  const match = /-([a-z])$/.exec(zoneId)
  if (!match) return undefined
  const vswitchId = vswitchIds[match[1].toUpperCase()]
  return vswitchId ? vswitchId : undefined
}

export function spotPriceLimit(
  pricePerCore: number,
  cpuCores: number
): number {
  return pricePerCore * cpuCores * SPOT_PRICE_MARGIN
}

export function formatPrice(price: number): string {
  return price.toFixed(4)
}

interface RankedCandidate {
  offer: InstanceOffer
  candidate: Candidate
}

function rankCandidates(
  offers: InstanceOffer[],
  vswitchIds: Record<string, string>
): RankedCandidate[] {
  const ranked: RankedCandidate[] = []
  for (const offer of offers) {
    const vswitchId = resolveVSwitchId(offer.zoneId, vswitchIds)
    if (!vswitchId) {
      log.info(
        `No VSwitch configured for zone ${offer.zoneId}, skipping ${offer.instanceType}`
      )
      continue
    }
    ranked.push({
      offer,
      candidate: {
        instanceType: offer.instanceType,
        zoneId: offer.zoneId,
        vswitchId,
        spotPriceLimit: formatPrice(
          spotPriceLimit(offer.pricePerCore, offer.cpuCores)
        ),
        cpuCores: offer.cpuCores
      }
    })
  }
  return _.take(ranked, MAX_CANDIDATES)
}

export function toCandidates(
  offers: InstanceOffer[],
  vswitchIds: Record<string, string>
): Candidate[] {
  return rankCandidates(offers, vswitchIds).map(r => r.candidate)
}

function describeStrategy(
  params: ISelectParams,
  strategy: SearchStrategy
): string {
  if (strategy.exact) {
    return `Exact match (${strategy.cpu}c${strategy.mem}g, ${strategy.label})`
  }
  return `Range query (${strategy.cpu}-${params.maxCpu}c, ${params.minMem}-${params.maxMem}g)`
}

/**
 * Runs the search strategies in order until one yields an offer meeting the
 * minimum requirements. Returns those offers in advisor order.
 */
export async function searchOffers(
  params: ISelectParams,
  advisor: AdvisorWorker
): Promise<InstanceOffer[]> {
  const strategies = buildStrategies(params.arch, params.minCpu, params.maxCpu)
  const started = Date.now()
  let anyResult = false

  for (const [index, strategy] of strategies.entries()) {
    const attempt = index + 1
    log.info(`Attempt ${attempt}: ${describeStrategy(params, strategy)}`)

    const records = await advisor.query(strategy)
    if (records === undefined) continue
    anyResult = true

    const offers = filterOffers(
      _.compact(records.map(r => normalizeOffer(r, params.arch))),
      params.minCpu,
      params.minMem
    )
    if (offers.length > 0) {
      log.info(
        `Success: Found results with strategy ${attempt} (${strategy.cpu}c${strategy.mem}g)`
      )
      log.info(
        `Query completed in ${((Date.now() - started) / 1000).toFixed(2)} seconds`
      )
      return offers
    }
    log.info(`Strategy ${attempt} returned no usable instances`)
  }

  if (!anyResult) {
    throw new Error(
      'All query strategies failed. No spot instances found matching the criteria.'
    )
  }
  throw new Error(
    `No instances found matching minimum requirements (${params.minCpu}c${params.minMem}g)`
  )
}

export async function selectInstance(
  params: ISelectParams,
  advisor: AdvisorWorker
): Promise<SelectionResult> {
  const offers = await searchOffers(params, advisor)
  const ranked = rankCandidates(offers, params.vswitchIds)
  if (ranked.length === 0) {
    throw new Error(
      'No instances found with VSwitch ID configured. ' +
        'Please ensure VSwitch IDs are configured for at least one zone.'
    )
  }
  return {
    primary: ranked[0].candidate,
    primaryOffer: ranked[0].offer,
    candidates: ranked.map(r => r.candidate)
  }
}
