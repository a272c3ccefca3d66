import { describe, it, expect } from 'vitest'
import { JobAlreadyActiveError } from '../../../core/errors.js'
import { ActiveJobRegistry } from '../active-job-registry.js'

describe('ActiveJobRegistry', () => {
  it('hands an entry to exactly one claimant', () => {
    const registry = new ActiveJobRegistry<string>()
    registry.add('job-1', 'entry')

    expect(registry.claim('job-1')).toBe('entry')
    expect(registry.claim('job-1')).toBeUndefined()
    expect(registry.has('job-1')).toBe(false)
  })

  it('rejects a duplicate job id', () => {
    const registry = new ActiveJobRegistry<string>()
    registry.add('job-1', 'entry')

    expect(() => registry.add('job-1', 'again')).toThrow(JobAlreadyActiveError)
    expect(() => registry.add('job-1', 'again')).toThrow('Job job-1 is already being polled')
  })

  it('claims everything at once', () => {
    const registry = new ActiveJobRegistry<number>()
    registry.add('job-1', 1)
    registry.add('job-2', 2)

    expect(registry.ids()).toEqual(['job-1', 'job-2'])
    expect(registry.claimAll()).toEqual([1, 2])
    expect(registry.size).toBe(0)
  })
})
