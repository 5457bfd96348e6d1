import * as fs from 'fs'
import * as log from './log'
import {
  AliyunWorker,
  Candidate,
  DiskCategory,
  ExecResult,
  IProvisionParams
} from './interfaces'
import { extractInstanceId, isDiskCategoryUnsupported } from './aliyun'
import { readCandidatesFile } from './candidates'
import { encodeUserData, ensureShebang, readUserData } from './userData'

export const DISK_CATEGORIES: readonly DiskCategory[] = [
  'cloud_essd',
  'cloud_ssd',
  'cloud_efficiency'
]

const RESPONSE_SNIPPET = 500

const IMAGE_REQUIRED =
  'Either ALIYUN_IMAGE_FAMILY or ALIYUN_IMAGE_ID must be set. ' +
  'If using ALIYUN_IMAGE_ID, it must be provided.'

export type AttemptOutcome =
  | { kind: 'created'; instanceId: string }
  | { kind: 'next-disk'; response: string }
  | { kind: 'abort'; response: string }

export interface ProvisionTarget {
  instanceType: string
  zoneId?: string
  vswitchId: string
  spotPriceLimit?: string
}

export interface LaunchSettings {
  imageId: string
  userDataB64?: string
}

interface TargetResult {
  instanceId?: string
  diskCategory?: DiskCategory
  calls: number
  lastResponse: string
}

export function classifyAttempt(result: ExecResult): AttemptOutcome {
  if (result.exitCode === 0 && result.output) {
    const instanceId =
      extractInstanceId(result.stdout) ?? extractInstanceId(result.output)
    if (instanceId) {
      return { kind: 'created', instanceId }
    }
    return { kind: 'next-disk', response: result.output }
  }
  if (result.exitCode !== 0 && isDiskCategoryUnsupported(result.output)) {
    return { kind: 'next-disk', response: result.output }
  }
  return { kind: 'abort', response: result.output }
}

/**
 * Disk categories to try, in order. A preferred category goes first; a list
 * of supported categories narrows the order unless nothing would remain.
 */
export function diskCategoryOrder(
  preferred?: DiskCategory,
  supported?: string[]
): DiskCategory[] {
  let order = preferred
    ? [preferred, ...DISK_CATEGORIES.filter(c => c !== preferred)]
    : [...DISK_CATEGORIES]
  if (supported) {
    const narrowed = order.filter(c => supported.includes(c))
    if (narrowed.length > 0) {
      order = narrowed
    }
  }
  return order
}

async function diskCategoriesFor(
  aliyun: AliyunWorker,
  params: IProvisionParams,
  target: ProvisionTarget
): Promise<DiskCategory[]> {
  if (!params.detectDiskCategory) {
    return diskCategoryOrder(params.systemDiskCategory)
  }
  const supported = await aliyun.getSupportedDiskCategories(
    target.instanceType,
    target.zoneId
  )
  const order = diskCategoryOrder(params.systemDiskCategory, supported)
  log.info(`Disk categories for ${target.instanceType}: ${order.join(', ')}`)
  return order
}

async function provisionTarget(
  aliyun: AliyunWorker,
  params: IProvisionParams,
  target: ProvisionTarget,
  launch: LaunchSettings
): Promise<TargetResult> {
  const disks = await diskCategoriesFor(aliyun, params, target)
  let calls = 0
  let lastResponse = ''

  for (const diskCategory of disks) {
    log.info(
      `Attempting to create instance with disk category: ${diskCategory}`
    )
    calls++
    const outcome = classifyAttempt(
      await aliyun.runInstances({
        imageId: launch.imageId,
        instanceType: target.instanceType,
        vswitchId: target.vswitchId,
        diskCategory,
        spotPriceLimit: target.spotPriceLimit,
        userDataB64: launch.userDataB64
      })
    )
    if (outcome.kind === 'created') {
      return {
        instanceId: outcome.instanceId,
        diskCategory,
        calls,
        lastResponse
      }
    }
    lastResponse = outcome.response
    if (outcome.kind === 'abort') {
      log.warning(
        `Instance creation failed with disk category ${diskCategory}`
      )
      break
    }
    log.info(
      `Disk category ${diskCategory} not usable for ${target.instanceType}, trying next...`
    )
  }
  return { calls, lastResponse }
}

export async function createFromCandidates(
  aliyun: AliyunWorker,
  params: IProvisionParams,
  candidates: Candidate[],
  launch: LaunchSettings
): Promise<string> {
  const count = candidates.length
  log.info(`Found ${count} candidate instances for retry`)
  let calls = 0
  let lastResponse = ''

  for (const [index, candidate] of candidates.entries()) {
    const attempt = index + 1
    if (!candidate.vswitchId) {
      log.warning(`VSwitch ID is empty for candidate ${attempt}, skipping`)
      continue
    }
    log.info(
      `Attempt ${attempt}/${count}: Trying instance type ${candidate.instanceType} in zone ${candidate.zoneId}`
    )
    const result = await provisionTarget(
      aliyun,
      params,
      {
        instanceType: candidate.instanceType,
        zoneId: candidate.zoneId,
        vswitchId: candidate.vswitchId,
        spotPriceLimit: candidate.spotPriceLimit || undefined
      },
      launch
    )
    calls += result.calls
    if (result.instanceId) {
      log.info(
        `Spot instance created successfully on attempt ${attempt} with disk category: ${result.diskCategory}`
      )
      log.info(`Instance Type: ${candidate.instanceType}`)
      log.info(`Zone: ${candidate.zoneId}`)
      log.info(`VSwitch: ${candidate.vswitchId}`)
      return result.instanceId
    }
    lastResponse = result.lastResponse
    log.warning(`Attempt ${attempt} failed: All disk categories failed`)
    if (lastResponse) {
      log.info(`Response: ${lastResponse.slice(0, RESPONSE_SNIPPET)}...`)
    }
  }

  throw new Error(
    `Failed to create Spot instance after ${count} attempts (${calls} creation calls). ` +
      `Last response: ${lastResponse.slice(0, RESPONSE_SNIPPET)}`
  )
}

export async function createSingle(
  aliyun: AliyunWorker,
  params: IProvisionParams,
  launch: LaunchSettings
): Promise<string> {
  if (!params.instanceType) {
    throw new Error('INSTANCE_TYPE is required')
  }
  if (!params.vswitchId) {
    throw new Error('ALIYUN_VSWITCH_ID is required')
  }
  const result = await provisionTarget(
    aliyun,
    params,
    {
      instanceType: params.instanceType,
      vswitchId: params.vswitchId,
      spotPriceLimit: params.spotPriceLimit
    },
    launch
  )
  if (result.instanceId) {
    log.info(
      `Instance created successfully with disk category: ${result.diskCategory}`
    )
    return result.instanceId
  }
  throw new Error(
    `Failed to create Spot instance with all disk categories. Last error: ${result.lastResponse}`
  )
}

export async function resolveImageId(
  aliyun: AliyunWorker,
  params: IProvisionParams
): Promise<string> {
  if (params.imageFamily) {
    log.info(`Getting latest image from family: ${params.imageFamily}`)
    const imageId = await aliyun.getImageFromFamily(params.imageFamily)
    if (imageId) {
      return imageId
    }
    log.warning(
      `Failed to get image from family ${params.imageFamily}, falling back to ALIYUN_IMAGE_ID`
    )
  }
  if (!params.imageId) {
    throw new Error(IMAGE_REQUIRED)
  }
  return params.imageId
}

function prepareUserData(params: IProvisionParams): string | undefined {
  const userData = readUserData(params.userDataFile, params.userData)
  if (userData === undefined) {
    return undefined
  }
  return encodeUserData(ensureShebang(userData))
}

/**
 * Creates one spot instance and returns its ID. Uses the candidates file when
 * it exists, otherwise the single configured instance type and VSwitch.
 */
export async function provisionInstance(
  aliyun: AliyunWorker,
  params: IProvisionParams
): Promise<string> {
  const candidatesFile =
    params.candidatesFile && fs.existsSync(params.candidatesFile)
      ? params.candidatesFile
      : undefined
  if (params.candidatesFile && !candidatesFile) {
    log.warning(
      `Candidates file ${params.candidatesFile} not found, using single instance type`
    )
  }
  if (!candidatesFile) {
    if (!params.instanceType) {
      throw new Error('INSTANCE_TYPE is required')
    }
    if (!params.vswitchId) {
      throw new Error('ALIYUN_VSWITCH_ID is required')
    }
  }
  if (!params.imageFamily && !params.imageId) {
    throw new Error(IMAGE_REQUIRED)
  }

  await aliyun.checkCli()
  const imageId = await resolveImageId(aliyun, params)
  const userDataB64 = prepareUserData(params)

  log.info('=== Creating Spot Instance ===')
  log.info(`Instance Name: ${params.instanceName}`)
  log.info(`Instance Type: ${params.instanceType ?? '(from candidates)'}`)
  log.info(`Region: ${params.region}`)
  log.info(`Architecture: ${params.arch}`)
  log.info(`VPC ID: ${params.vpcId}`)
  log.info(`VSwitch ID: ${params.vswitchId ?? '(from candidates)'}`)
  log.info(`Security Group ID: ${params.securityGroupId}`)
  log.info(`Image ID: ${imageId}`)
  if (params.keyPairName) {
    log.info(`Key Pair Name: ${params.keyPairName}`)
  }
  if (params.spotPriceLimit) {
    log.info(`Spot Price Limit: ${params.spotPriceLimit}`)
  }

  const launch: LaunchSettings = { imageId, userDataB64 }
  if (candidatesFile) {
    return createFromCandidates(
      aliyun,
      params,
      readCandidatesFile(candidatesFile),
      launch
    )
  }
  return createSingle(aliyun, params, launch)
}
