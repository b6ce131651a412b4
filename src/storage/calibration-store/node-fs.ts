/**
 * node:fs adapter for the calibration store
 */

import * as fs from 'fs';

import type { FileSystemAPI } from './types';

export const nodeFileSystem: FileSystemAPI = {
  existsSync: function(path: string) {
    return fs.existsSync(path);
  },
  readFileSync: function(path: string, encoding: 'utf8') {
    return fs.readFileSync(path, encoding);
  },
  writeFileSync: function(path: string, data: string, encoding: 'utf8') {
    fs.writeFileSync(path, data, encoding);
  },
  renameSync: function(oldPath: string, newPath: string) {
    fs.renameSync(oldPath, newPath);
  },
  unlinkSync: function(path: string) {
    fs.unlinkSync(path);
  },
  mkdirSync: function(path: string, options: { recursive: true }) {
    fs.mkdirSync(path, options);
  }
};
