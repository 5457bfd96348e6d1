import * as core from '@actions/core'
import * as log from '../log'
import { CapturedOutput, captureOutput } from './internal/output'

jest.mock('@actions/core')

const savedEnv = process.env
let output: CapturedOutput

beforeEach(() => {
  jest.clearAllMocks()
  process.env = { ...savedEnv }
  delete process.env.GITHUB_OUTPUT
  delete process.env.GITHUB_ACTIONS
  output = captureOutput()
})

afterEach(() => {
  jest.restoreAllMocks()
  log.useCommandLine(false)
  process.exitCode = undefined
  process.env = savedEnv
})

describe('as an action step', () => {
  test('everything goes through the action toolkit', () => {
    log.info('progress')
    log.warning('careful')
    log.setSecret('test-secret')
    log.setOutput('instance-id', 'i-1')
    log.fail('broken')
    expect(core.info).toHaveBeenCalledWith('progress')
    expect(core.warning).toHaveBeenCalledWith('careful')
    expect(core.setSecret).toHaveBeenCalledWith('test-secret')
    expect(core.setOutput).toHaveBeenCalledWith('instance-id', 'i-1')
    expect(core.setFailed).toHaveBeenCalledWith('broken')
    expect(output.stdout).toEqual([])
  })
})

describe('from the command line', () => {
  beforeEach(() => {
    log.useCommandLine(true)
  })

  test('diagnostics go to stderr and results to stdout', () => {
    log.info('progress')
    log.warning('careful')
    log.error('broken')
    log.result('i-1')
    expect(output.stderr).toEqual([
      'progress\n',
      'Warning: careful\n',
      'Error: broken\n'
    ])
    expect(output.stdout).toEqual(['i-1\n'])
    expect(core.info).not.toHaveBeenCalled()
  })

  test('debug lines need debug logging', () => {
    log.debug('hidden')
    jest.mocked(core.isDebug).mockReturnValue(true)
    log.debug('shown')
    expect(output.stderr).toEqual(['[debug] shown\n'])
  })

  test('step outputs are written only to the output file', () => {
    log.setOutput('instance-id', 'i-1')
    expect(core.setOutput).not.toHaveBeenCalled()
    process.env.GITHUB_OUTPUT = '/tmp/test-output'
    log.setOutput('instance-id', 'i-1')
    expect(core.setOutput).toHaveBeenCalledWith('instance-id', 'i-1')
  })

  test('masks secrets only inside a workflow', () => {
    log.setSecret('test%secret')
    expect(output.stderr).toEqual([])
    process.env.GITHUB_ACTIONS = 'true'
    log.setSecret('test%secret')
    expect(output.stderr).toEqual(['::add-mask::test%25secret\n'])
    expect(core.setSecret).not.toHaveBeenCalled()
  })

  test('fail sets the exit code', () => {
    log.fail('broken')
    expect(output.stderr).toEqual(['Error: broken\n'])
    expect(process.exitCode).toBe(1)
    expect(core.setFailed).not.toHaveBeenCalled()
  })
})
