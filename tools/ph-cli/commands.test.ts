/**
 * Tests for CLI command implementations
 */

import {
  calibrateCommand,
  calibratePh4Command,
  calibratePh7Command,
  parseNumberArg,
  readCommand,
  resetCommand,
  setCommand,
  showCommand,
} from './commands'
import { initialize } from '@boot/init'
import { CalibrationValidationError, InvalidInputError } from '$types/errors'
import { createMemoryFileSystem } from '$test-utils/memory-fs'

import type { PhSensorRuntime } from '@boot/types'
import type { MemoryFileSystem } from '$test-utils/memory-fs'

const FILE = '/data/ph.json'

describe('CLI commands', () => {
  let fs: MemoryFileSystem
  let runtime: PhSensorRuntime

  beforeEach(() => {
    fs = createMemoryFileSystem()
    const out = { log: vi.fn(), warn: vi.fn(), error: vi.fn() }
    const created = initialize({ CALIBRATION_FILE_PATH: FILE, CONSOLE_ENABLED: false }, { fs, console: out })
    if (created === null) throw new Error('runtime failed to initialize')
    runtime = created
  })

  describe('parseNumberArg', () => {
    it('should parse decimal text', () => {
      expect(parseNumberArg('1515.5', 'mV')).toBe(1515.5)
    })

    it('should reject blank text', () => {
      expect(() => parseNumberArg('  ', 'mV')).toThrow(InvalidInputError)
    })

    it('should name the argument in the error', () => {
      expect(() => parseNumberArg('abc', 'mV')).toThrow("mV must be a number, got 'abc'")
    })
  })

  describe('readCommand', () => {
    it('should print the rounded pH', () => {
      expect(readCommand(runtime, '1515')).toEqual(['pH 6.92'])
    })

    it('should honour --decimals', () => {
      expect(readCommand(runtime, '1515', { decimals: '3' })).toEqual(['pH 6.915'])
    })

    it('should reject --decimals outside 0 to 6', () => {
      expect(() => readCommand(runtime, '1515', { decimals: '400' }))
        .toThrow('read: decimals must be an integer from 0 to 6, got 400')
      expect(() => readCommand(runtime, '1515', { decimals: '-1' })).toThrow(InvalidInputError)
    })

    it('should reject fractional --decimals', () => {
      expect(() => readCommand(runtime, '1515', { decimals: '1.5' }))
        .toThrow('read: decimals must be an integer from 0 to 6, got 1.5')
      expect(() => readCommand(runtime, '1500', { temperature: '35', decimals: '2.5' })).toThrow(InvalidInputError)
    })

    it('should compensate for temperature', () => {
      expect(readCommand(runtime, '1500', { temperature: '35' })).toEqual(['pH 7.77 (1500 mV at 35 °C)'])
    })

    it('should use an explicit coefficient', () => {
      expect(readCommand(runtime, '1500', { temperature: '35', coefficient: '0' }))
        .toEqual(['pH 7.00 (1500 mV at 35 °C)'])
    })

    it('should reject non-numeric readings', () => {
      expect(() => readCommand(runtime, 'abc')).toThrow(InvalidInputError)
    })
  })

  describe('calibration commands', () => {
    it('should auto calibrate the neutral buffer', () => {
      expect(calibrateCommand(runtime, '1515')).toEqual(['Calibrated neutral pH 7 buffer at 1515 mV'])
      expect(readCommand(runtime, '1515')).toEqual(['pH 7.00'])
    })

    it('should auto calibrate the acid buffer', () => {
      expect(calibrateCommand(runtime, '2000')).toEqual(['Calibrated acid pH 4 buffer at 2000 mV'])
    })

    it('should refuse readings between the buffers', () => {
      expect(() => calibrateCommand(runtime, '1750')).toThrow(CalibrationValidationError)
    })

    it('should calibrate each buffer explicitly', () => {
      expect(calibratePh7Command(runtime, '1400')).toEqual(['Calibrated neutral pH 7 buffer at 1400 mV'])
      expect(calibratePh4Command(runtime, '2100')).toEqual(['Calibrated acid pH 4 buffer at 2100 mV'])
      expect(runtime.sensor.getActiveVoltages()).toEqual({ neutralMv: 1400, acidMv: 2100 })
    })

    it('should set and persist both voltages', () => {
      expect(setCommand(runtime, '1400', '2100')).toEqual(['Calibration set: neutral 1400 mV, acid 2100 mV'])
      expect(JSON.parse(fs.files.get(FILE) ?? '{}')).toMatchObject({ neutral_voltage: 1400, acid_voltage: 2100 })
    })

    it('should reset to defaults', () => {
      setCommand(runtime, '1400', '2100')

      expect(resetCommand(runtime)).toEqual(['Calibration reset to defaults: neutral 1500 mV, acid 2032.44 mV'])
    })
  })

  describe('showCommand', () => {
    it('should print the active calibration', () => {
      setCommand(runtime, '1400', '2100')

      expect(showCommand(runtime)).toEqual([
        'File:      /data/ph.json',
        'Neutral:   1400 mV (pH 7)',
        'Acid:      2100 mV (pH 4)',
        'Slope:     -0.004286 pH/mV',
        'Intercept: 13.0000',
      ])
    })
  })
})
