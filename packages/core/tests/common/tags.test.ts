import { describe, it, expect, vi, afterEach } from 'vitest'
import { parseTags, serializeTags, TagsSchema } from '../../src/common/index.js'

afterEach(() => {
  vi.restoreAllMocks()
})

describe('tags', () => {
  it('serializes and parses keeping order', () => {
    const raw = serializeTags(['退火', '温度', 'safety'])
    expect(raw).toBe('["退火","温度","safety"]')
    expect(parseTags(raw, 'test')).toEqual(['退火', '温度', 'safety'])
  })

  it('treats an empty column as no tags', () => {
    expect(parseTags('', 'test')).toEqual([])
    expect(parseTags(null, 'test')).toEqual([])
  })

  it('warns and returns [] for a corrupt column', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    expect(parseTags('{not json', 'entry 3')).toEqual([])
    expect(warn).toHaveBeenCalledWith('[tags] entry 3: unreadable tags column, treating as empty')
  })

  it('normalizes input tags: trims and drops later duplicates', () => {
    expect(TagsSchema.parse([' cnc ', 'safety', 'cnc'])).toEqual(['cnc', 'safety'])
  })

  it('rejects blank tags', () => {
    expect(TagsSchema.safeParse(['ok', '  ']).success).toBe(false)
  })
})
