#!/usr/bin/env node
import * as core from '@actions/core'
import * as log from './log'
import {
  loadProvisionParams,
  loadSelectParams,
  loadUserDataParams,
  userDataPayload
} from './config'
import {
  generateRunnerUserData,
  provisionRunner,
  selectRunner,
  writeRunnerUserData
} from './cmd'
import { advisorClient } from './advisor'
import { aliyunClient } from './aliyun'
import { processRunner } from './exec'
import { gitHubClient, repositoryFromContext } from './github'

export async function run(argv: string[]): Promise<void> {
  log.useCommandLine(Boolean(argv[0]))
  try {
    const mode = argv[0] || core.getInput('mode')
    if (!mode) {
      throw new Error(`The 'mode' argument is not specified`)
    }
    switch (mode) {
      case 'select':
        await prepareSelect()
        break
      case 'provision':
        await prepareProvision()
        break
      case 'write-user-data':
        await writeRunnerUserData(argv[1], userDataPayload(), readStdin)
        break
      case 'generate-user-data':
        await prepareGenerate(argv[1])
        break
      default:
        throw new Error(
          'Wrong mode. Allowed values: select, provision, write-user-data, generate-user-data.'
        )
    }
  } catch (error) {
    log.fail(error instanceof Error ? error.message : String(error))
  }
}

async function prepareSelect(): Promise<void> {
  const params = loadSelectParams()
  log.setSecret(params.accessKeySecret)
  await selectRunner(params, new advisorClient(params, new processRunner()))
}

async function prepareProvision(): Promise<void> {
  const params = loadProvisionParams()
  log.setSecret(params.accessKeySecret)
  await provisionRunner(params, new aliyunClient(params, new processRunner()))
}

async function prepareGenerate(outputFile?: string): Promise<void> {
  const params = loadUserDataParams()
  if (!params.repository) {
    params.repository = repositoryFromContext()
  }
  const github =
    params.githubToken && !params.registrationToken
      ? new gitHubClient(params.githubToken, params.repository)
      : undefined
  await generateRunnerUserData(params, outputFile, github)
}

async function readStdin(): Promise<string> {
  if (process.stdin.isTTY) {
    return ''
  }
  const chunks: Buffer[] = []
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
  }
  return Buffer.concat(chunks).toString('utf8')
}

if (require.main === module) {
  void run(process.argv.slice(2))
}
