/**
 * Error hierarchy tests
 */

import { describe, it, expect } from 'vitest'
import {
  SpecgenError,
  ConfigurationError,
  FileSystemError,
  ExternalToolError,
  VerificationError,
} from '../src/core/errors.js'

describe('Error hierarchy', () => {
  describe('SpecgenError', () => {
    it('should carry message, code and context', () => {
      const error = new SpecgenError('Something broke', 'TEST_CODE', { step: 'clone' })
      expect(error.message).toBe('Something broke')
      expect(error.code).toBe('TEST_CODE')
      expect(error.name).toBe('SpecgenError')
      expect(error.context.step).toBe('clone')
      expect(error).toBeInstanceOf(Error)
    })

    it('should default context to an empty object', () => {
      const error = new SpecgenError('No context', 'TEST_CODE')
      expect(error.context).toEqual({})
    })

    it('should have a stack trace', () => {
      const error = new SpecgenError('Stack test', 'STACK_TEST')
      expect(error.stack).toBeDefined()
      expect(error.stack).toContain('SpecgenError')
    })
  })

  describe('ConfigurationError', () => {
    it('should create configuration error', () => {
      const error = new ConfigurationError('Template missing', { specType: 'python3' })
      expect(error.code).toBe('CONFIGURATION_ERROR')
      expect(error.name).toBe('ConfigurationError')
      expect(error.context.specType).toBe('python3')
      expect(error).toBeInstanceOf(SpecgenError)
    })
  })

  describe('FileSystemError', () => {
    it('should create file system error', () => {
      const error = new FileSystemError('Directory exists', { path: '/tmp/foo' })
      expect(error.code).toBe('FILE_SYSTEM_ERROR')
      expect(error.name).toBe('FileSystemError')
      expect(error).toBeInstanceOf(SpecgenError)
    })
  })

  describe('ExternalToolError', () => {
    it('should create external tool error', () => {
      const error = new ExternalToolError('git failed', { tool: 'git', exitCode: 128 })
      expect(error.code).toBe('EXTERNAL_TOOL_ERROR')
      expect(error.name).toBe('ExternalToolError')
      expect(error.context.exitCode).toBe(128)
      expect(error).toBeInstanceOf(SpecgenError)
    })
  })

  describe('VerificationError', () => {
    it('should create verification error', () => {
      const error = new VerificationError('Trees differ', { differences: 1 })
      expect(error.code).toBe('VERIFICATION_ERROR')
      expect(error.name).toBe('VerificationError')
      expect(error).toBeInstanceOf(SpecgenError)
    })
  })

  describe('toJSON', () => {
    it('should serialize all error types to JSON', () => {
      const errors = [
        new ConfigurationError('Config error'),
        new FileSystemError('Fs error'),
        new ExternalToolError('Tool error'),
        new VerificationError('Verify error'),
      ]

      for (const error of errors) {
        const json = error.toJSON()
        expect(json.name).toBe(error.name)
        expect(json.message).toBe(error.message)
        expect(json.code).toBe(error.code)
        expect(json.context).toEqual({})
      }
    })
  })
})
