/**
 * CLI command implementations
 * Each command takes an initialized runtime and returns the lines to print
 */

import { bufferLabel, validateDecimals } from '@core/calibration'
import { fmtMv, fmtPh } from '@logging'
import { InvalidInputError } from '$types/errors'

import type { PhSensorRuntime } from '@boot/types'

export interface ReadOptions {
  temperature?: string
  coefficient?: string
  decimals?: string
}

/**
 * Parse a numeric command-line argument
 * @throws {InvalidInputError} If the text is not a finite number
 */
export function parseNumberArg(text: string, name: string): number {
  const value = text.trim() === '' ? NaN : Number(text)
  if (!Number.isFinite(value)) {
    throw new InvalidInputError(`${name} must be a number, got '${text}'`, text)
  }
  return value
}

export function readCommand(runtime: PhSensorRuntime, mvText: string, options: ReadOptions = {}): string[] {
  const mv = parseNumberArg(mvText, 'mV')
  const decimals = options.decimals !== undefined
    ? parseNumberArg(options.decimals, 'decimals')
    : runtime.config.READING_DECIMALS
  validateDecimals(decimals, 'read')

  if (options.temperature === undefined) {
    return [fmtPh(runtime.sensor.readPh(mv, decimals), decimals)]
  }

  const temperature = parseNumberArg(options.temperature, 'temperature')
  const coefficient = options.coefficient !== undefined
    ? parseNumberArg(options.coefficient, 'coefficient')
    : undefined
  const ph = runtime.sensor.readPhTemperatureCompensated(mv, temperature, coefficient, decimals)

  return [`${fmtPh(ph, decimals)} (${fmtMv(mv)} at ${temperature} °C)`]
}

export function calibrateCommand(runtime: PhSensorRuntime, mvText: string): string[] {
  const mv = parseNumberArg(mvText, 'mV')
  const kind = runtime.sensor.autoCalibrate(mv)
  return [`Calibrated ${bufferLabel(kind, runtime.config)} buffer at ${fmtMv(mv)}`]
}

export function calibratePh7Command(runtime: PhSensorRuntime, mvText: string): string[] {
  const mv = parseNumberArg(mvText, 'mV')
  runtime.sensor.calibratePh7(mv)
  return [`Calibrated ${bufferLabel('neutral', runtime.config)} buffer at ${fmtMv(mv)}`]
}

export function calibratePh4Command(runtime: PhSensorRuntime, mvText: string): string[] {
  const mv = parseNumberArg(mvText, 'mV')
  runtime.sensor.calibratePh4(mv)
  return [`Calibrated ${bufferLabel('acid', runtime.config)} buffer at ${fmtMv(mv)}`]
}

export function setCommand(runtime: PhSensorRuntime, neutralText: string, acidText: string): string[] {
  const neutral = parseNumberArg(neutralText, 'neutral mV')
  const acid = parseNumberArg(acidText, 'acid mV')
  runtime.sensor.setCalibrationData(neutral, acid)
  return [`Calibration set: neutral ${fmtMv(neutral)}, acid ${fmtMv(acid)}`]
}

export function resetCommand(runtime: PhSensorRuntime): string[] {
  runtime.sensor.resetToDefault()
  const voltages = runtime.sensor.getActiveVoltages()
  return [`Calibration reset to defaults: neutral ${fmtMv(voltages.neutralMv)}, acid ${fmtMv(voltages.acidMv)}`]
}

export function showCommand(runtime: PhSensorRuntime): string[] {
  const record = runtime.sensor.getCalibration()
  const config = runtime.config

  return [
    `File:      ${runtime.store.getPath()}`,
    `Neutral:   ${fmtMv(record.pointHigh.mv)} (pH ${config.NEUTRAL_PH})`,
    `Acid:      ${fmtMv(record.pointLow.mv)} (pH ${config.ACID_PH})`,
    `Slope:     ${record.slope.toFixed(6)} pH/mV`,
    `Intercept: ${record.intercept.toFixed(4)}`,
  ]
}
