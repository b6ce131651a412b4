/**
 * In-memory sink
 *
 * Keeps formatted lines so embedding hosts and tests can inspect them.
 */

import type { MemorySink } from '../types';

/**
 * Create a sink that stores every written line
 * @returns Memory sink instance
 */
export function createMemorySink(): MemorySink {
  const lines: string[] = [];

  return {
    write: function(formattedMessage: string) {
      lines.push(formattedMessage);
    },
    getLines: function() {
      return lines.slice();
    },
    clear: function() {
      lines.length = 0;
    }
  };
}
