import * as fs from 'fs'
import { TextDecoder } from 'util'
import * as log from './log'
import { GitHubWorker, IUserDataParams } from './interfaces'

const DEFAULT_SHEBANG = '#!/bin/bash'

export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n/g, '\n').replace(/\r/g, '\n')
}

export function byteLength(text: string): number {
  return Buffer.byteLength(text, 'utf8')
}

/**
 * Reads the boot script from `file` when it exists, else uses the inline
 * content. Line endings are normalized to LF.
 */
export function readUserData(
  file?: string,
  inline?: string
): string | undefined {
  if (file && fs.existsSync(file) && fs.statSync(file).isFile()) {
    const userData = normalizeLineEndings(fs.readFileSync(file, 'utf8'))
    log.info(
      `Using User Data from file: ${file} (${byteLength(userData)} bytes, normalized)`
    )
    return userData
  }
  if (inline) {
    const userData = normalizeLineEndings(inline)
    log.info(
      `Using User Data from environment variable (${byteLength(userData)} bytes, normalized)`
    )
    return userData
  }
  log.info('No User Data provided')
  return undefined
}

export function ensureShebang(userData: string): string {
  if (userData.startsWith('#!')) {
    return userData
  }
  log.info(`User Data missing shebang; prepending ${DEFAULT_SHEBANG}`)
  return `${DEFAULT_SHEBANG}\n${userData}`
}

export function encodeUserData(userData: string): string {
  return Buffer.from(userData, 'utf8').toString('base64')
}

export function decodeUserData(payload: string): string {
  const compact = payload.replace(/\s+/g, '')
  if (!/^[A-Za-z0-9+/]*={0,2}$/.test(compact) || compact.length % 4 !== 0) {
    throw new Error('payload is not valid base64')
  }
  const bytes = Buffer.from(compact, 'base64')
  return new TextDecoder('utf-8', { fatal: true }).decode(bytes)
}

/**
 * Decodes the base64 payload and writes it to `outputFile`. Returns the
 * number of bytes written.
 */
export function writeUserData(outputFile: string, payload: string): number {
  if (!payload) {
    throw new Error('User Data content is empty')
  }
  let userData: string
  try {
    userData = decodeUserData(payload)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(`Failed to decode base64 User Data: ${message}`)
  }
  try {
    fs.writeFileSync(outputFile, userData, 'utf8')
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(`Failed to write User Data to ${outputFile}: ${message}`)
  }
  const size = byteLength(userData)
  log.info(`User Data file created: ${outputFile} (${size} bytes)`)
  return size
}

export function quoteShellValue(value: string): string {
  return value.replace(/[\\"$`]/g, c => `\\${c}`)
}

/**
 * Replaces the `NAME="${NAME:-default}"` assignments of the template with the
 * given values. Variables without a value keep their default.
 */
export function renderUserData(
  template: string,
  values: Record<string, string | undefined>
): string {
  let rendered = template
  for (const [name, value] of Object.entries(values)) {
    if (!value) continue
    const assignment = new RegExp(
      `^(\\s*)${name}="\\$\\{${name}:-[^}]*\\}"`,
      'm'
    )
    rendered = rendered.replace(
      assignment,
      (_match, indent: string) => `${indent}${name}="${quoteShellValue(value)}"`
    )
  }
  return rendered
}

export async function generateUserData(
  params: IUserDataParams,
  template: string,
  github?: GitHubWorker
): Promise<string> {
  if (!params.repository) {
    throw new Error('GITHUB_REPOSITORY is required')
  }
  if (!params.runnerName) {
    throw new Error('RUNNER_NAME is required')
  }
  let token = params.registrationToken
  if (!token && github) {
    token = await github.getRegistrationToken()
  }
  if (!token) {
    throw new Error('RUNNER_REGISTRATION_TOKEN is required')
  }
  log.setSecret(token)

  return renderUserData(template, {
    RUNNER_REGISTRATION_TOKEN: token,
    GITHUB_REPOSITORY: params.repository,
    RUNNER_NAME: params.runnerName,
    RUNNER_LABELS: params.runnerLabels,
    RUNNER_VERSION: params.runnerVersion,
    HTTP_PROXY: params.httpProxy,
    HTTPS_PROXY: params.httpsProxy,
    NO_PROXY: params.noProxy,
    ALIYUN_ECS_SELF_DESTRUCT_ROLE_NAME: params.selfDestructRoleName
  })
}
