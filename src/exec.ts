import { execFile } from 'child_process'
import * as log from './log'
import { CommandRunner, ExecOptions, ExecResult } from './interfaces'

export const LOOKUP_TIMEOUT_MS = 30 * 1000

// Exit code reported for a call killed by its timeout, as timeout(1) does.
export const TIMEOUT_EXIT_CODE = 124

export class processRunner implements CommandRunner {
  async execute(
    command: string,
    args: string[],
    options: ExecOptions = {}
  ): Promise<ExecResult> {
    const timeout = options.timeoutMs ?? 0
    return new Promise(resolve => {
      execFile(
        command,
        args,
        {
          encoding: 'utf8',
          timeout,
          maxBuffer: 16 * 1024 * 1024,
          env: { ...process.env, ...options.env }
        },
        (error, stdout, stderr) => {
          const output = `${stdout}${stderr}`
          if (error === null) {
            resolve({ exitCode: 0, output, stdout })
            return
          }
          if (error.killed && timeout > 0) {
            log.warning(`${command} did not finish within ${timeout / 1000}s`)
            resolve({
              exitCode: TIMEOUT_EXIT_CODE,
              output: output || `${command} timed out`,
              stdout
            })
            return
          }
          const exitCode = typeof error.code === 'number' ? error.code : 1
          resolve({
            exitCode,
            output: output || error.message,
            stdout
          })
        }
      )
    })
  }
}
