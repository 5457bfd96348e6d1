import * as fs from 'fs'
import * as log from './log'
import {
  AdvisorWorker,
  AliyunWorker,
  GitHubWorker,
  IProvisionParams,
  ISelectParams,
  IUserDataParams
} from './interfaces'
import { writeCandidatesFile } from './candidates'
import { memoryRatio } from './offers'
import { provisionInstance } from './provision'
import { formatPrice, selectInstance, SPOT_PRICE_MARGIN } from './select'
import { encodeUserData, generateUserData, writeUserData } from './userData'

// Results go to stdout as KEY=value lines and to the step outputs.
function emit(name: string, value: string | number): void {
  log.setOutput(name, value)
  log.result(`${name}=${value}`)
}

export async function selectRunner(
  params: ISelectParams,
  advisor: AdvisorWorker
): Promise<string> {
  log.info(
    `Querying for ${params.arch.toUpperCase()} instances ` +
      `(CPU:RAM = 1:${memoryRatio(params.arch)}, ` +
      `${params.minCpu}c${params.minMem}g to ${params.maxCpu}c${params.maxMem}g)`
  )
  advisor.ensureExecutable()

  log.info(`Querying spot instances for architecture: ${params.arch}`)
  log.info(`Region: ${params.region}`)
  log.info(
    `Starting with minimum requirements: ${params.minCpu}c${params.minMem}g`
  )
  const { primary, primaryOffer, candidates } = await selectInstance(
    params,
    advisor
  )
  const candidatesFile = writeCandidatesFile(candidates)

  emit('INSTANCE_TYPE', primary.instanceType)
  emit('ZONE_ID', primary.zoneId)
  emit('VSWITCH_ID', primary.vswitchId)
  emit('SPOT_PRICE_LIMIT', primary.spotPriceLimit)
  emit('CPU_CORES', primaryOffer.cpuCores)
  emit('CANDIDATES_FILE', candidatesFile)

  const totalPrice = primaryOffer.pricePerCore * primaryOffer.cpuCores
  log.info('Selected instance (primary):')
  log.info(`  Type: ${primary.instanceType}`)
  log.info(`  Zone: ${primary.zoneId}`)
  log.info(`  VSwitch: ${primary.vswitchId}`)
  log.info(`  CPU Cores: ${primaryOffer.cpuCores}`)
  log.info(`  Price per core: ${primaryOffer.pricePerCore}`)
  log.info(`  Total price: ${formatPrice(totalPrice)}`)
  log.info(
    `  Spot price limit: ${primary.spotPriceLimit} (x${SPOT_PRICE_MARGIN})`
  )
  log.info(`  Candidates available: ${candidates.length}`)
  return candidatesFile
}

export async function provisionRunner(
  params: IProvisionParams,
  aliyun: AliyunWorker
): Promise<string> {
  const instanceId = await provisionInstance(aliyun, params)
  log.setOutput('instance-id', instanceId)
  log.result(instanceId)
  return instanceId
}

export async function writeRunnerUserData(
  outputFile: string | undefined,
  payload: string | undefined,
  readStdin: () => Promise<string>
): Promise<number> {
  if (!outputFile) {
    throw new Error('Usage: write-user-data <output_file>')
  }
  const data = payload || (await readStdin()).trim()
  if (!data) {
    throw new Error('User Data content is empty')
  }
  return writeUserData(outputFile, data)
}

export async function generateRunnerUserData(
  params: IUserDataParams,
  outputFile: string | undefined,
  github?: GitHubWorker
): Promise<string> {
  if (!fs.existsSync(params.templateFile)) {
    throw new Error(`Template file not found: ${params.templateFile}`)
  }
  const template = fs.readFileSync(params.templateFile, 'utf8')
  const userData = await generateUserData(params, template, github)
  const encoded = encodeUserData(userData)
  log.setSecret(encoded)
  log.setOutput('USER_DATA_B64', encoded)
  if (outputFile) {
    fs.writeFileSync(outputFile, userData, 'utf8')
    log.info(`User Data written to ${outputFile}`)
  }
  return encoded
}
