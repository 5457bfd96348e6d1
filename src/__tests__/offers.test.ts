import {
  filterOffers,
  normalizeOffer,
  parseCpuFromInstanceType
} from '../offers'

jest.mock('@actions/core')

describe('parseCpuFromInstanceType', () => {
  test.each([
    ['ecs.c7.2xlarge', 8],
    ['ecs.g7.4xlarge', 16],
    ['ecs.c7.16xlarge', 64],
    ['ecs.c7.xlarge', 4],
    ['ecs.c7.large', 2],
    ['ecs.t6-c1m1.medium', 2]
  ])('%s has %d cores', (instanceType, cores) => {
    expect(parseCpuFromInstanceType(instanceType)).toBe(cores)
  })

  test('unknown suffixes are undetermined', () => {
    expect(parseCpuFromInstanceType('ecs.t5-lc1m1.small')).toBeUndefined()
    expect(parseCpuFromInstanceType('ecs.c7.xlarge2')).toBeUndefined()
  })
})

describe('normalizeOffer', () => {
  test('reads camelCase fields', () => {
    expect(
      normalizeOffer(
        {
          instanceTypeId: 'ecs.c7.2xlarge',
          zoneId: 'cn-hangzhou-k',
          pricePerCore: 0.05,
          cpuCoreCount: '8',
          memorySize: '15.9'
        },
        'amd64'
      )
    ).toEqual({
      instanceType: 'ecs.c7.2xlarge',
      zoneId: 'cn-hangzhou-k',
      pricePerCore: 0.05,
      cpuCores: 8,
      memorySize: 15
    })
  })

  test('derives cores and memory for amd64 from PascalCase fields', () => {
    expect(
      normalizeOffer(
        {
          InstanceType: 'ecs.g7.4xlarge',
          ZoneId: 'cn-hangzhou-i',
          Price: '0.031'
        },
        'amd64'
      )
    ).toEqual({
      instanceType: 'ecs.g7.4xlarge',
      zoneId: 'cn-hangzhou-i',
      pricePerCore: 0.031,
      cpuCores: 16,
      memorySize: 16
    })
  })

  test('estimates two GB per core on arm64', () => {
    const offer = normalizeOffer(
      {
        instance_type: 'ecs.g8y.2xlarge',
        zone_id: 'cn-hangzhou-j',
        price_per_core: 0.02
      },
      'arm64'
    )
    expect(offer?.cpuCores).toBe(8)
    expect(offer?.memorySize).toBe(16)
  })

  test('falls back to the type name when the core count is not an integer', () => {
    const offer = normalizeOffer(
      {
        instanceTypeId: 'ecs.c7.xlarge',
        zoneId: 'cn-hangzhou-k',
        pricePerCore: 0.05,
        cores: '4.5'
      },
      'amd64'
    )
    expect(offer?.cpuCores).toBe(4)
  })

  test('discards incomplete records', () => {
    expect(
      normalizeOffer({ instanceTypeId: 'ecs.c7.2xlarge', zoneId: 'z-k' }, 'amd64')
    ).toBeUndefined()
    expect(
      normalizeOffer(
        { instanceTypeId: 'ecs.c7.2xlarge', zoneId: '', pricePerCore: 1 },
        'amd64'
      )
    ).toBeUndefined()
    expect(
      normalizeOffer(
        { instanceTypeId: 'ecs.t5.small', zoneId: 'z-k', pricePerCore: 1 },
        'amd64'
      )
    ).toBeUndefined()
    expect(
      normalizeOffer(
        { instanceTypeId: 'ecs.c7.large', zoneId: 'z-k', pricePerCore: 0 },
        'amd64'
      )
    ).toBeUndefined()
    expect(normalizeOffer('ecs.c7.large', 'amd64')).toBeUndefined()
    expect(normalizeOffer(null, 'amd64')).toBeUndefined()
  })
})

test('filterOffers drops offers below the minimum', () => {
  const offer = {
    instanceType: 'ecs.c7.2xlarge',
    zoneId: 'cn-hangzhou-k',
    pricePerCore: 0.05,
    cpuCores: 8,
    memorySize: 16
  }
  const small = { ...offer, instanceType: 'ecs.c7.xlarge', cpuCores: 4 }
  const lowMemory = { ...offer, instanceType: 'ecs.c7.2xlarge-lm', memorySize: 8 }
  expect(filterOffers([small, offer, lowMemory], 8, 16)).toEqual([offer])
})
