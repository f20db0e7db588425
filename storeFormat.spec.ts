import { describe, expect, it } from 'vitest'
import { decodeEntries, decodeLine, encodeEntries } from './storeFormat'

describe('storeFormat', () => {
  describe('encodeEntries', () => {
    it('should write one tab-separated line per entry', () => {
      expect(
        encodeEntries([
          { key: 'a', value: '1' },
          { key: 'b', value: '2' },
        ]),
      ).toBe('a\t1\nb\t2\n')
    })

    it('should write nothing for no entries', () => {
      expect(encodeEntries([])).toBe('')
    })
  })

  describe('decodeLine', () => {
    it('should split on the first tab only', () => {
      expect(decodeLine('key\tva\tlue')).toEqual({ key: 'key', value: 'va\tlue' })
    })

    it('should trim surrounding whitespace before splitting', () => {
      expect(decodeLine('  key\tvalue \r')).toEqual({ key: 'key', value: 'value' })
    })

    it('should skip blank lines and lines without a tab', () => {
      expect(decodeLine('')).toBeNull()
      expect(decodeLine('   ')).toBeNull()
      expect(decodeLine('no-delimiter')).toBeNull()
    })

    it('should skip a line whose only tab is trailing', () => {
      expect(decodeLine('key\t')).toBeNull()
    })
  })

  describe('decodeEntries', () => {
    it('should keep well-formed lines and drop the rest', () => {
      const content = 'a\t1\ngarbage\n\nb\t2\nc\t\n'
      expect(decodeEntries(content)).toEqual([
        { key: 'a', value: '1' },
        { key: 'b', value: '2' },
      ])
    })

    it('should accept a final line without a terminator', () => {
      expect(decodeEntries('a\t1\nb\t2')).toEqual([
        { key: 'a', value: '1' },
        { key: 'b', value: '2' },
      ])
    })
  })
})
