import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { Candidate } from './interfaces'

// INSTANCE_TYPE|ZONE_ID|VSWITCH_ID|SPOT_PRICE_LIMIT|CPU_CORES
const SEPARATOR = '|'

export function formatCandidate(candidate: Candidate): string {
  return [
    candidate.instanceType,
    candidate.zoneId,
    candidate.vswitchId,
    candidate.spotPriceLimit,
    candidate.cpuCores === undefined ? '' : String(candidate.cpuCores)
  ].join(SEPARATOR)
}

export function parseCandidates(content: string): Candidate[] {
  const candidates: Candidate[] = []
  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim()
    if (!line) continue

    const parts = line.split(SEPARATOR)
    if (parts.length < 4) continue

    const cores = parts[4] ?? ''
    candidates.push({
      instanceType: parts[0],
      zoneId: parts[1],
      vswitchId: parts[2],
      spotPriceLimit: parts[3],
      cpuCores: /^\d+$/.test(cores) ? Number(cores) : undefined
    })
  }
  return candidates
}

export function readCandidatesFile(file: string): Candidate[] {
  return parseCandidates(fs.readFileSync(file, 'utf8'))
}

/**
 * Writes the candidates to a new file under the system temp directory and
 * returns its path. The file is left in place for the provisioning step.
 */
export function writeCandidatesFile(candidates: Candidate[]): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ecs-spot-'))
  const file = path.join(dir, 'candidates.txt')
  const body = candidates.map(c => `${formatCandidate(c)}\n`).join('')
  fs.writeFileSync(file, body, 'utf8')
  return file
}
