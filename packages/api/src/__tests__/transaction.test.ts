import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import {
  MAX_TRANSACTION_ATTEMPTS,
  createTransactionRunner,
  isRetryableTransactionError,
} from '../lib/transaction'

describe('isRetryableTransactionError', () => {
  it('retries serialization failures and deadlocks', () => {
    expect(isRetryableTransactionError({ code: '40001' })).toBe(true)
    expect(isRetryableTransactionError({ code: '40P01' })).toBe(true)
  })

  it('reads the SQLSTATE from a wrapped cause', () => {
    const error = new Error('Failed query', { cause: { code: '40001' } })
    expect(isRetryableTransactionError(error)).toBe(true)
  })

  it('does not retry other errors', () => {
    expect(isRetryableTransactionError({ code: '23505' })).toBe(false)
    expect(isRetryableTransactionError(new Error('boom'))).toBe(false)
    expect(isRetryableTransactionError(null)).toBe(false)
  })
})

describe('createTransactionRunner', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('replays the work after a serialization failure', async () => {
    const transaction = vi.fn().mockRejectedValueOnce({ code: '40001' }).mockResolvedValueOnce('done')
    const run = createTransactionRunner({ transaction }, 'tenant-1')

    await expect(run(async () => 'unused')).resolves.toBe('done')
    expect(transaction).toHaveBeenCalledTimes(2)
    expect(transaction.mock.calls[0]?.[1]).toEqual({ isolationLevel: 'serializable' })
  })

  it('gives up after the maximum number of attempts', async () => {
    const conflict = { code: '40001' }
    const transaction = vi.fn().mockRejectedValue(conflict)
    const run = createTransactionRunner({ transaction }, 'tenant-1')

    await expect(run(async () => 'unused')).rejects.toBe(conflict)
    expect(transaction).toHaveBeenCalledTimes(MAX_TRANSACTION_ATTEMPTS)
  })

  it('rethrows non-retryable errors immediately', async () => {
    const failure = new Error('constraint violated')
    const transaction = vi.fn().mockRejectedValue(failure)
    const run = createTransactionRunner({ transaction }, 'tenant-1')

    await expect(run(async () => 'unused')).rejects.toBe(failure)
    expect(transaction).toHaveBeenCalledTimes(1)
  })
})
