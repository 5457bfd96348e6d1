import {
  Arch,
  DiskCategory,
  IProvisionParams,
  ISelectParams,
  IUserDataParams
} from './interfaces'
import { DISK_CATEGORIES } from './provision'

type Env = Record<string, string | undefined>

const VSWITCH_PREFIX = 'ALIYUN_VSWITCH_ID_'

// workflow_dispatch inputs arrive as empty strings when left blank
function optional(env: Env, name: string): string | undefined {
  const value = env[name]?.trim()
  return value ? value : undefined
}

function required(env: Env, name: string): string {
  const value = optional(env, name)
  if (value === undefined) {
    throw new Error(`${name} is required`)
  }
  return value
}

function integer(env: Env, name: string, fallback: number): number {
  const value = optional(env, name)
  if (value === undefined) return fallback
  if (!/^[+-]?\d+$/.test(value)) {
    throw new Error(`${name} must be an integer, got: ${value}`)
  }
  return Number(value)
}

function flag(env: Env, name: string): boolean {
  return /^(true|yes|1)$/i.test(optional(env, name) ?? '')
}

export function parseArch(value: string | undefined): Arch {
  const arch = value ?? 'amd64'
  if (arch !== 'amd64' && arch !== 'arm64') {
    throw new Error(`ARCH must be either 'amd64' or 'arm64', got: ${arch}`)
  }
  return arch
}

function isDiskCategory(value: string): value is DiskCategory {
  return DISK_CATEGORIES.some(c => c === value)
}

export function vswitchIdsFromEnv(env: Env): Record<string, string> {
  const vswitchIds: Record<string, string> = {}
  const pattern = new RegExp(`^${VSWITCH_PREFIX}([A-Z])$`)
  for (const name of Object.keys(env)) {
    const match = pattern.exec(name)
    const value = optional(env, name)
    if (match && value) {
      vswitchIds[match[1]] = value
    }
  }
  return vswitchIds
}

export function loadSelectParams(env: Env = process.env): ISelectParams {
  const accessKeyId = required(env, 'ALIYUN_ACCESS_KEY_ID')
  const accessKeySecret = required(env, 'ALIYUN_ACCESS_KEY_SECRET')
  const region = required(env, 'ALIYUN_REGION_ID')
  const arch = parseArch(optional(env, 'ARCH'))

  const ratio = arch === 'arm64' ? 2 : 1
  const minCpu = integer(env, 'MIN_CPU', 8)
  const maxCpu = integer(env, 'MAX_CPU', 64)
  const minMem = integer(env, 'MIN_MEM', minCpu * ratio)
  const maxMem = integer(env, 'MAX_MEM', arch === 'arm64' ? 128 : 64)

  if (minCpu > maxCpu) {
    throw new Error(
      `MIN_CPU (${minCpu}) must be less than or equal to MAX_CPU (${maxCpu})`
    )
  }
  if (minMem > maxMem) {
    throw new Error(
      `MIN_MEM (${minMem}) must be less than or equal to MAX_MEM (${maxMem})`
    )
  }

  return {
    accessKeyId,
    accessKeySecret,
    region,
    arch,
    minCpu,
    maxCpu,
    minMem,
    maxMem,
    advisorBinary:
      optional(env, 'SPOT_ADVISOR_BINARY') ?? './spot-instance-advisor',
    vswitchIds: vswitchIdsFromEnv(env)
  }
}

export function loadProvisionParams(env: Env = process.env): IProvisionParams {
  const systemDiskCategory = optional(env, 'SYSTEM_DISK_CATEGORY')
  if (systemDiskCategory !== undefined && !isDiskCategory(systemDiskCategory)) {
    throw new Error(
      `SYSTEM_DISK_CATEGORY must be one of ${DISK_CATEGORIES.join(', ')}, got: ${systemDiskCategory}`
    )
  }

  return {
    accessKeyId: required(env, 'ALIYUN_ACCESS_KEY_ID'),
    accessKeySecret: required(env, 'ALIYUN_ACCESS_KEY_SECRET'),
    region: required(env, 'ALIYUN_REGION_ID'),
    vpcId: required(env, 'ALIYUN_VPC_ID'),
    securityGroupId: required(env, 'ALIYUN_SECURITY_GROUP_ID'),
    instanceName: required(env, 'INSTANCE_NAME'),
    arch: parseArch(optional(env, 'ARCH')),
    imageFamily: optional(env, 'ALIYUN_IMAGE_FAMILY'),
    imageId: optional(env, 'ALIYUN_IMAGE_ID'),
    vswitchId: optional(env, 'ALIYUN_VSWITCH_ID'),
    instanceType: optional(env, 'INSTANCE_TYPE'),
    spotPriceLimit: optional(env, 'SPOT_PRICE_LIMIT'),
    candidatesFile: optional(env, 'CANDIDATES_FILE'),
    keyPairName: optional(env, 'ALIYUN_KEY_PAIR_NAME'),
    ramRoleName: optional(env, 'ALIYUN_ECS_SELF_DESTRUCT_ROLE_NAME'),
    userDataFile: optional(env, 'USER_DATA_FILE'),
    // inline scripts keep their surrounding whitespace
    userData: env.USER_DATA ? env.USER_DATA : undefined,
    systemDiskCategory,
    detectDiskCategory: flag(env, 'DETECT_DISK_CATEGORY')
  }
}

export function loadUserDataParams(env: Env = process.env): IUserDataParams {
  return {
    templateFile: optional(env, 'TEMPLATE_FILE') ?? 'templates/user-data.sh',
    registrationToken: optional(env, 'RUNNER_REGISTRATION_TOKEN'),
    githubToken: optional(env, 'GITHUB_TOKEN'),
    repository: optional(env, 'GITHUB_REPOSITORY'),
    runnerName: optional(env, 'RUNNER_NAME'),
    runnerLabels: optional(env, 'RUNNER_LABELS'),
    runnerVersion: optional(env, 'RUNNER_VERSION'),
    httpProxy: optional(env, 'HTTP_PROXY'),
    httpsProxy: optional(env, 'HTTPS_PROXY'),
    noProxy: optional(env, 'NO_PROXY'),
    selfDestructRoleName: optional(env, 'ALIYUN_ECS_SELF_DESTRUCT_ROLE_NAME')
  }
}

export function userDataPayload(env: Env = process.env): string | undefined {
  return optional(env, 'USER_DATA_B64')
}
