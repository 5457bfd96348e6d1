import * as core from '@actions/core'

// When a mode is run from the command line, stdout carries the results only
// and every diagnostic goes to stderr.
let commandLine = false

export function useCommandLine(enabled: boolean): void {
  commandLine = enabled
}

function toStderr(message: string): void {
  process.stderr.write(`${message}\n`)
}

export function info(message: string): void {
  if (commandLine) {
    toStderr(message)
  } else {
    core.info(message)
  }
}

export function warning(message: string): void {
  if (commandLine) {
    toStderr(`Warning: ${message}`)
  } else {
    core.warning(message)
  }
}

export function error(message: string): void {
  if (commandLine) {
    toStderr(`Error: ${message}`)
  } else {
    core.error(message)
  }
}

export function debug(message: string): void {
  if (!commandLine) {
    core.debug(message)
  } else if (core.isDebug()) {
    toStderr(`[debug] ${message}`)
  }
}

/**
 * Masks a single-line value in the workflow log. From the command line the
 * runner still picks up the mask command on stderr.
 */
export function setSecret(secret: string): void {
  if (!commandLine) {
    core.setSecret(secret)
  } else if (process.env.GITHUB_ACTIONS === 'true') {
    const value = secret.replace(/%/g, '%25').replace(/\r/g, '%0D')
    toStderr(`::add-mask::${value}`)
  }
}

// Without GITHUB_OUTPUT, core.setOutput falls back to a stdout command.
export function setOutput(name: string, value: string | number): void {
  if (commandLine && !process.env.GITHUB_OUTPUT) return
  core.setOutput(name, value)
}

export function result(line: string): void {
  process.stdout.write(`${line}\n`)
}

export function fail(message: string): void {
  if (commandLine) {
    toStderr(`Error: ${message}`)
    process.exitCode = 1
  } else {
    core.setFailed(message)
  }
}
