import { AdvisorWorker, ISelectParams, SearchStrategy } from '../interfaces'
import {
  buildStrategies,
  formatPrice,
  resolveVSwitchId,
  searchOffers,
  selectInstance,
  spotPriceLimit,
  toCandidates
} from '../select'

jest.mock('@actions/core')

const params: ISelectParams = {
  accessKeyId: 'test-id',
  accessKeySecret: 'test-secret',
  region: 'cn-hangzhou',
  arch: 'amd64',
  minCpu: 8,
  maxCpu: 64,
  minMem: 8,
  maxMem: 64,
  advisorBinary: './spot-instance-advisor',
  vswitchIds: { K: 'vsw-k', I: 'vsw-i' }
}

function record(instanceType: string, zoneId: string, pricePerCore = 0.05) {
  return { instanceTypeId: instanceType, zoneId, pricePerCore }
}

function fakeAdvisor(
  answers: (unknown[] | undefined)[]
): AdvisorWorker & { query: jest.Mock } {
  const query = jest.fn(async (_strategy: SearchStrategy) => answers.shift())
  return { ensureExecutable: jest.fn(), query }
}

describe('buildStrategies', () => {
  test('amd64 below 16 cores tries both ratios, then 16 cores, then a range', () => {
    expect(buildStrategies('amd64', 8, 64)).toEqual([
      { cpu: 8, mem: 8, exact: true, label: '1:1' },
      { cpu: 8, mem: 16, exact: true, label: '1:2' },
      { cpu: 16, mem: 16, exact: true, label: '1:1' },
      { cpu: 16, mem: 32, exact: true, label: '1:2' },
      { cpu: 8, mem: 64, exact: false, label: 'range' }
    ])
  })

  test('amd64 at 16 cores skips the 16-core fallbacks', () => {
    expect(buildStrategies('amd64', 16, 64).map(s => s.label)).toEqual([
      '1:1',
      '1:2',
      'range'
    ])
  })

  test('amd64 above 32 cores skips the 1:2 query', () => {
    expect(buildStrategies('amd64', 40, 64)).toEqual([
      { cpu: 40, mem: 40, exact: true, label: '1:1' },
      { cpu: 40, mem: 64, exact: false, label: 'range' }
    ])
  })

  test('arm64 tries 1:2 then a range', () => {
    expect(buildStrategies('arm64', 8, 64)).toEqual([
      { cpu: 8, mem: 16, exact: true, label: '1:2' },
      { cpu: 8, mem: 64, exact: false, label: 'range' }
    ])
  })
})

describe('resolveVSwitchId', () => {
  test('uses the upper-cased zone suffix', () => {
    expect(resolveVSwitchId('cn-hangzhou-k', { K: 'vsw-k' })).toBe('vsw-k')
  })

  test('returns undefined for unconfigured or malformed zones', () => {
    expect(resolveVSwitchId('cn-hangzhou-j', { K: 'vsw-k' })).toBeUndefined()
    expect(resolveVSwitchId('cn-hangzhou-K', { K: 'vsw-k' })).toBeUndefined()
    expect(resolveVSwitchId('cn-hangzhou', { K: 'vsw-k' })).toBeUndefined()
  })
})

test('spot price limit adds a 20% margin', () => {
  expect(formatPrice(spotPriceLimit(0.05, 8))).toBe('0.4800')
  expect(formatPrice(spotPriceLimit(0.125, 16))).toBe('2.4000')
  expect(spotPriceLimit(0.05, 16)).toBeGreaterThan(spotPriceLimit(0.05, 8))
})

test('toCandidates keeps at most five offers with a VSwitch', () => {
  const offers = ['k', 'j', 'k', 'i', 'k', 'k', 'k'].map((suffix, i) => ({
    instanceType: `ecs.c7.type${i}`,
    zoneId: `cn-hangzhou-${suffix}`,
    pricePerCore: 0.05,
    cpuCores: 8,
    memorySize: 8
  }))
  const candidates = toCandidates(offers, params.vswitchIds)
  expect(candidates.map(c => c.instanceType)).toEqual([
    'ecs.c7.type0',
    'ecs.c7.type2',
    'ecs.c7.type3',
    'ecs.c7.type4',
    'ecs.c7.type5'
  ])
  expect(candidates[2]).toEqual({
    instanceType: 'ecs.c7.type3',
    zoneId: 'cn-hangzhou-i',
    vswitchId: 'vsw-i',
    spotPriceLimit: '0.4800',
    cpuCores: 8
  })
})

describe('searchOffers', () => {
  test('stops at the first strategy with a usable offer', async () => {
    const advisor = fakeAdvisor([
      undefined,
      [record('ecs.c7.2xlarge', 'cn-hangzhou-k')],
      [record('ecs.c7.4xlarge', 'cn-hangzhou-k')]
    ])
    const offers = await searchOffers(params, advisor)
    expect(offers.map(o => o.instanceType)).toEqual(['ecs.c7.2xlarge'])
    expect(advisor.query).toHaveBeenCalledTimes(2)
    expect(advisor.query.mock.calls[1][0]).toEqual({
      cpu: 8,
      mem: 16,
      exact: true,
      label: '1:2'
    })
  })

  test('moves on when every offer is below the minimum', async () => {
    const advisor = fakeAdvisor([
      [record('ecs.c7.xlarge', 'cn-hangzhou-k')],
      [record('ecs.c7.2xlarge', 'cn-hangzhou-i')]
    ])
    const offers = await searchOffers(params, advisor)
    expect(offers.map(o => o.zoneId)).toEqual(['cn-hangzhou-i'])
    expect(advisor.query).toHaveBeenCalledTimes(2)
  })

  test('fails when no strategy returns anything', async () => {
    const advisor = fakeAdvisor([])
    await expect(searchOffers(params, advisor)).rejects.toThrow(
      'All query strategies failed. No spot instances found matching the criteria.'
    )
    expect(advisor.query).toHaveBeenCalledTimes(5)
  })

  test('fails when results never meet the minimum', async () => {
    const small = [record('ecs.c7.large', 'cn-hangzhou-k')]
    const advisor = fakeAdvisor([small, small, small, small, small])
    await expect(searchOffers(params, advisor)).rejects.toThrow(
      'No instances found matching minimum requirements (8c8g)'
    )
  })
})

describe('selectInstance', () => {
  test('primary is the first offer with a VSwitch', async () => {
    const advisor = fakeAdvisor([
      [
        record('ecs.c7.2xlarge', 'cn-hangzhou-j', 0.04),
        record('ecs.g7.2xlarge', 'cn-hangzhou-k', 0.05),
        record('ecs.c7.4xlarge', 'cn-hangzhou-i', 0.06)
      ]
    ])
    const { primary, primaryOffer, candidates } = await selectInstance(
      params,
      advisor
    )
    expect(primary).toEqual({
      instanceType: 'ecs.g7.2xlarge',
      zoneId: 'cn-hangzhou-k',
      vswitchId: 'vsw-k',
      spotPriceLimit: '0.4800',
      cpuCores: 8
    })
    expect(primaryOffer.pricePerCore).toBe(0.05)
    expect(candidates.map(c => c.vswitchId)).toEqual(['vsw-k', 'vsw-i'])
  })

  test('fails when no zone has a VSwitch', async () => {
    const advisor = fakeAdvisor([[record('ecs.c7.2xlarge', 'cn-hangzhou-j')]])
    await expect(selectInstance(params, advisor)).rejects.toThrow(
      'No instances found with VSwitch ID configured.'
    )
  })
})
