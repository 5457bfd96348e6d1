export type Arch = 'amd64' | 'arm64'

export type DiskCategory = 'cloud_essd' | 'cloud_ssd' | 'cloud_efficiency'

export interface ISelectParams {
  accessKeyId: string
  accessKeySecret: string
  region: string
  arch: Arch
  minCpu: number
  maxCpu: number
  minMem: number
  maxMem: number
  advisorBinary: string
  // zone suffix letter (upper case) -> VSwitch ID
  vswitchIds: Record<string, string>
}

export interface IProvisionParams {
  accessKeyId: string
  accessKeySecret: string
  region: string
  vpcId: string
  securityGroupId: string
  instanceName: string
  arch: Arch
  imageFamily?: string
  imageId?: string
  vswitchId?: string
  instanceType?: string
  spotPriceLimit?: string
  candidatesFile?: string
  keyPairName?: string
  ramRoleName?: string
  userDataFile?: string
  userData?: string
  systemDiskCategory?: DiskCategory
  detectDiskCategory: boolean
}

export interface IUserDataParams {
  templateFile: string
  registrationToken?: string
  githubToken?: string
  repository?: string
  runnerName?: string
  runnerLabels?: string
  runnerVersion?: string
  httpProxy?: string
  httpsProxy?: string
  noProxy?: string
  selfDestructRoleName?: string
}

export interface InstanceOffer {
  instanceType: string
  zoneId: string
  pricePerCore: number
  cpuCores: number
  memorySize: number
}

export interface SearchStrategy {
  cpu: number
  mem: number
  exact: boolean
  label: string
}

export interface Candidate {
  instanceType: string
  zoneId: string
  vswitchId: string
  spotPriceLimit: string
  cpuCores?: number
}

export interface ExecResult {
  exitCode: number
  // stdout followed by stderr
  output: string
  stdout: string
}

export interface ExecOptions {
  timeoutMs?: number
  env?: Record<string, string>
}

export interface CommandRunner {
  execute(
    command: string,
    args: string[],
    options?: ExecOptions
  ): Promise<ExecResult>
}

export interface RunInstancesRequest {
  imageId: string
  instanceType: string
  vswitchId: string
  diskCategory: DiskCategory
  spotPriceLimit?: string
  userDataB64?: string
}

export interface AdvisorWorker {
  ensureExecutable(): void
  query(strategy: SearchStrategy): Promise<unknown[] | undefined>
}

export interface AliyunWorker {
  checkCli(): Promise<void>
  getImageFromFamily(family: string): Promise<string | undefined>
  getSupportedDiskCategories(
    instanceType: string,
    zoneId?: string
  ): Promise<string[] | undefined>
  runInstances(request: RunInstancesRequest): Promise<ExecResult>
}

export interface GitHubWorker {
  getRegistrationToken(): Promise<string>
}
