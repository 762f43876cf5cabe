// tests/repo-scanner/filter.test.ts
import { describe, it, expect } from 'vitest'
import { shouldIgnore, isBinaryPath, normalizePath } from '../../src/repo-scanner/filter.js'

describe('filter', () => {
  describe('shouldIgnore', () => {
    it('should ignore node_modules', () => {
      expect(shouldIgnore('node_modules/lodash/index.js')).toBe(true)
    })

    it('should ignore .git and virtualenvs', () => {
      expect(shouldIgnore('.git/config')).toBe(true)
      expect(shouldIgnore('.venv/lib/site.py')).toBe(true)
      expect(shouldIgnore('venv/bin/activate')).toBe(true)
    })

    it('should ignore custom patterns', () => {
      expect(shouldIgnore('vendor/lib.js', ['vendor'])).toBe(true)
      expect(shouldIgnore('assets/bundle.min.js', ['*.min.js'])).toBe(true)
    })

    it('should match whole path segments only', () => {
      expect(shouldIgnore('src/builder.ts')).toBe(false)
      expect(shouldIgnore('packages/app/build/out.js')).toBe(true)
    })

    it('should not ignore regular source files', () => {
      expect(shouldIgnore('src/index.ts')).toBe(false)
    })
  })

  describe('isBinaryPath', () => {
    it('should detect images and archives', () => {
      expect(isBinaryPath('assets/logo.PNG')).toBe(true)
      expect(isBinaryPath('release.tar')).toBe(true)
    })

    it('should accept text sources', () => {
      expect(isBinaryPath('src/main.py')).toBe(false)
    })
  })

  describe('normalizePath', () => {
    it('should strip whitespace and leading ./ and /', () => {
      expect(normalizePath('  ./src/app.ts ')).toBe('src/app.ts')
      expect(normalizePath('/src/app.ts')).toBe('src/app.ts')
      expect(normalizePath('.//src//app.ts')).toBe('src/app.ts')
    })

    it('should convert backslashes', () => {
      expect(normalizePath('src\\core\\engine.ts')).toBe('src/core/engine.ts')
    })

    it('should reject parent traversal', () => {
      expect(normalizePath('../secrets.txt')).toBe('')
      expect(normalizePath('src/../../x')).toBe('')
    })
  })
})
