/**
 * Tests for configuration module
 */

import CONFIG, { USER_CONFIG, APP_CONSTANTS, buildConfig } from './config';
import { validateConfig } from '@validation';

describe('Configuration', () => {
  describe('USER_CONFIG', () => {
    it('should store calibration data in the working directory by default', () => {
      expect(USER_CONFIG.CALIBRATION_FILE_PATH).toBe('ph_calibration_data.json');
      expect(USER_CONFIG.CALIBRATION_MAKEDIRS).toBe(true);
    });

    it('should report two decimals by default', () => {
      expect(USER_CONFIG.READING_DECIMALS).toBe(2);
    });

    it('should compensate around 25 °C', () => {
      expect(USER_CONFIG.REFERENCE_TEMPERATURE_C).toBe(25);
      expect(USER_CONFIG.TEMP_COMPENSATION_COEFFICIENT).toBe(0.01);
    });

    it('should pass validation without warnings', () => {
      const result = validateConfig(USER_CONFIG, APP_CONSTANTS);

      expect(result.valid).toBe(true);
      expect(result.warnings).toEqual([]);
    });
  });

  describe('APP_CONSTANTS', () => {
    it('should use distinct log levels', () => {
      const levels = APP_CONSTANTS.LOG_LEVELS;
      expect(new Set([levels.DEBUG, levels.INFO, levels.WARNING, levels.CRITICAL]).size).toBe(4);
    });

    it('should put default voltages inside their windows', () => {
      const neutral = APP_CONSTANTS.NEUTRAL_WINDOW_MV;
      const acid = APP_CONSTANTS.ACID_WINDOW_MV;

      expect(APP_CONSTANTS.DEFAULT_NEUTRAL_VOLTAGE_MV).toBeGreaterThan(neutral.min);
      expect(APP_CONSTANTS.DEFAULT_NEUTRAL_VOLTAGE_MV).toBeLessThan(neutral.max);
      expect(APP_CONSTANTS.DEFAULT_ACID_VOLTAGE_MV).toBeGreaterThan(acid.min);
      expect(APP_CONSTANTS.DEFAULT_ACID_VOLTAGE_MV).toBeLessThan(acid.max);
    });

    it('should use pH 7 and pH 4 buffers', () => {
      expect(APP_CONSTANTS.NEUTRAL_PH).toBe(7);
      expect(APP_CONSTANTS.ACID_PH).toBe(4);
    });
  });

  describe('buildConfig', () => {
    it('should merge user config with constants', () => {
      const config = buildConfig({ ...USER_CONFIG, READING_DECIMALS: 4 });

      expect(config.READING_DECIMALS).toBe(4);
      expect(config.NEUTRAL_PH).toBe(7);
    });

    it('should back the default export', () => {
      expect(CONFIG.CALIBRATION_FILE_PATH).toBe(USER_CONFIG.CALIBRATION_FILE_PATH);
      expect(CONFIG.ACID_WINDOW_MV).toEqual({ min: 1854, max: 2210 });
    });
  });
});
