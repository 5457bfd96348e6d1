import * as fs from 'fs'
import * as log from './log'
import {
  AdvisorWorker,
  CommandRunner,
  ISelectParams,
  SearchStrategy
} from './interfaces'
import { LOOKUP_TIMEOUT_MS } from './exec'

const ADVISOR_LIMIT = 5

export function advisorArch(arch: ISelectParams['arch']): string {
  return arch === 'amd64' ? 'x86_64' : 'arm64'
}

export function buildAdvisorArgs(
  params: ISelectParams,
  strategy: SearchStrategy
): string[] {
  const cpu = strategy.exact
    ? [strategy.cpu, strategy.cpu]
    : [strategy.cpu, params.maxCpu]
  const mem = strategy.exact
    ? [strategy.mem, strategy.mem]
    : [params.minMem, params.maxMem]
  return [
    `-accessKeyId=${params.accessKeyId}`,
    `-accessKeySecret=${params.accessKeySecret}`,
    `-region=${params.region}`,
    `-mincpu=${cpu[0]}`,
    `-maxcpu=${cpu[1]}`,
    `-minmem=${mem[0]}`,
    `-maxmem=${mem[1]}`,
    `-limit=${ADVISOR_LIMIT}`,
    '--json',
    `--arch=${advisorArch(params.arch)}`
  ]
}

export class advisorClient implements AdvisorWorker {
  params: ISelectParams
  runner: CommandRunner

  constructor(params: ISelectParams, runner: CommandRunner) {
    this.params = params
    this.runner = runner
  }

  ensureExecutable(): void {
    const binary = this.params.advisorBinary
    if (!fs.existsSync(binary) || !fs.statSync(binary).isFile()) {
      throw new Error(`spot-instance-advisor binary not found: ${binary}`)
    }
    try {
      fs.accessSync(binary, fs.constants.X_OK)
    } catch {
      log.info(`Marking ${binary} as executable`)
      fs.chmodSync(binary, 0o755)
    }
  }

  async query(strategy: SearchStrategy): Promise<unknown[] | undefined> {
    const result = await this.runner.execute(
      this.params.advisorBinary,
      buildAdvisorArgs(this.params, strategy),
      { timeoutMs: LOOKUP_TIMEOUT_MS }
    )
    if (result.exitCode !== 0) {
      log.info(`Advisor exited with code ${result.exitCode}`)
      return undefined
    }
    if (!result.stdout.trim()) {
      return undefined
    }
    let data: unknown
    try {
      data = JSON.parse(result.stdout)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      log.warning(`Query failed: ${message}`)
      return undefined
    }
    if (!Array.isArray(data) || data.length === 0) {
      return undefined
    }
    return data
  }
}
