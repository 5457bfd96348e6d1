import _ from 'lodash'
import * as log from './log'
import {
  AliyunWorker,
  CommandRunner,
  ExecResult,
  IProvisionParams,
  RunInstancesRequest
} from './interfaces'
import { LOOKUP_TIMEOUT_MS } from './exec'

const CLI = 'aliyun'

export const RUNNER_TAG = {
  key: 'GITHUB_RUNNER_TYPE',
  value: 'aliyun-ecs-spot'
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

export function buildRunInstancesArgs(
  params: IProvisionParams,
  request: RunInstancesRequest
): string[] {
  const args = [
    'ecs',
    'RunInstances',
    '--RegionId',
    params.region,
    '--ImageId',
    request.imageId,
    '--InstanceType',
    request.instanceType,
    '--SecurityGroupId',
    params.securityGroupId,
    '--VSwitchId',
    request.vswitchId,
    '--InstanceName',
    params.instanceName,
    '--InstanceChargeType',
    'PostPaid',
    '--SystemDisk.Category',
    request.diskCategory,
    '--SecurityEnhancementStrategy',
    'Deactive',
    '--Tag.1.Key',
    RUNNER_TAG.key,
    '--Tag.1.Value',
    RUNNER_TAG.value
  ]
  if (params.keyPairName) {
    args.push('--KeyPairName', params.keyPairName)
  }
  if (params.ramRoleName) {
    args.push('--RamRoleName', params.ramRoleName)
  }
  if (request.spotPriceLimit) {
    args.push(
      '--SpotStrategy',
      'SpotWithPriceLimit',
      '--SpotPriceLimit',
      request.spotPriceLimit
    )
  } else {
    args.push('--SpotStrategy', 'SpotAsPriceGo')
  }
  if (request.userDataB64) {
    args.push('--UserData', request.userDataB64)
  }
  return args
}

// Command line for the log, without the boot script payload.
export function describeArgs(args: string[]): string {
  const shown = args.map((arg, i) =>
    args[i - 1] === '--UserData' ? '<base64-encoded-data>' : arg
  )
  return `${CLI} ${shown.join(' ')}`
}

export function extractInstanceId(response: string): string | undefined {
  const data = parseJson(response)
  const fromSet: unknown = _.get(data, ['InstanceIdSets', 'InstanceIdSet', 0])
  if (typeof fromSet === 'string' && fromSet && fromSet !== 'null') {
    return fromSet
  }
  const match = /"InstanceId"\s*:\s*"([^"]+)"/.exec(response)
  if (match && match[1] !== 'null') {
    return match[1]
  }
  return undefined
}

export function isDiskCategoryUnsupported(response: string): boolean {
  return (
    response.includes('InvalidSystemDiskCategory') ||
    response.toLowerCase().includes('not support')
  )
}

export class aliyunClient implements AliyunWorker {
  params: IProvisionParams
  runner: CommandRunner

  constructor(params: IProvisionParams, runner: CommandRunner) {
    this.params = params
    this.runner = runner
  }

  private env(): Record<string, string> {
    return {
      ALIBABA_CLOUD_ACCESS_KEY_ID: this.params.accessKeyId,
      ALIBABA_CLOUD_ACCESS_KEY_SECRET: this.params.accessKeySecret,
      ALIBABA_CLOUD_REGION_ID: this.params.region
    }
  }

  private async lookup(args: string[]): Promise<ExecResult> {
    log.debug(describeArgs(args))
    return this.runner.execute(CLI, args, {
      timeoutMs: LOOKUP_TIMEOUT_MS,
      env: this.env()
    })
  }

  async checkCli(): Promise<void> {
    const version = await this.lookup(['--version'])
    if (version.exitCode !== 0) {
      log.error(version.output.slice(0, 200))
      throw new Error(
        'Aliyun CLI is not installed or not in PATH. ' +
          'Please ensure aliyun-cli-setup-action is used in the workflow'
      )
    }
    log.info('Verifying Aliyun CLI configuration...')
    const configured = await this.lookup(['configure', 'get'])
    if (configured.exitCode !== 0) {
      log.warning('Aliyun CLI configuration check failed, but continuing...')
    }
  }

  async getImageFromFamily(family: string): Promise<string | undefined> {
    const result = await this.lookup([
      'ecs',
      'DescribeImageFromFamily',
      '--RegionId',
      this.params.region,
      '--ImageFamily',
      family
    ])
    if (result.exitCode !== 0) {
      log.warning(
        `Failed to query image from family ${family} (exit code: ${result.exitCode})`
      )
      if (result.output) {
        log.warning(`Error output: ${result.output.slice(0, 200)}`)
      }
      return undefined
    }
    const imageId: unknown = _.get(parseJson(result.stdout), [
      'Image',
      'ImageId'
    ])
    if (typeof imageId !== 'string' || !imageId) {
      log.warning(`No image returned for family ${family}`)
      return undefined
    }
    log.info(`Found latest image from family ${family}: ${imageId}`)
    return imageId
  }

  async getSupportedDiskCategories(
    instanceType: string,
    zoneId?: string
  ): Promise<string[] | undefined> {
    const args = [
      'ecs',
      'DescribeAvailableResource',
      '--RegionId',
      this.params.region,
      '--InstanceType',
      instanceType,
      '--DestinationResource',
      'SystemDisk'
    ]
    if (zoneId) {
      args.push('--ZoneId', zoneId)
    }
    const result = await this.lookup(args)
    if (result.exitCode !== 0) {
      log.warning(
        `Failed to query supported disk categories for ${instanceType}`
      )
      return undefined
    }
    const supported: unknown = _.get(parseJson(result.stdout), [
      'AvailableZones',
      'AvailableZone',
      0,
      'AvailableResources',
      'AvailableResource',
      0,
      'SupportedResources',
      'SupportedResource'
    ])
    if (!Array.isArray(supported)) {
      log.warning(`No disk category information for ${instanceType}`)
      return undefined
    }
    return _.compact(
      supported.map((r: unknown) => {
        const value: unknown = _.get(r, 'Value')
        return typeof value === 'string' ? value : undefined
      })
    )
  }

  async runInstances(request: RunInstancesRequest): Promise<ExecResult> {
    const args = buildRunInstancesArgs(this.params, request)
    log.info(`Executing command: ${describeArgs(args)}`)
    return this.runner.execute(CLI, args, { env: this.env() })
  }
}
