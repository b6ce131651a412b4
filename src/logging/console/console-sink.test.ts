/**
 * Unit tests for console sink
 */

import { createConsoleSink } from './console-sink';

describe('createConsoleSink', () => {
  let mockConsole: { log: ReturnType<typeof vi.fn>; warn: ReturnType<typeof vi.fn> };

  beforeEach(() => {
    mockConsole = {
      log: vi.fn(),
      warn: vi.fn()
    };
  });

  test('should write below warnFrom with log', () => {
    const sink = createConsoleSink(mockConsole, { warnFrom: 2 });

    sink.write('info line', 1);

    expect(mockConsole.log).toHaveBeenCalledWith('info line');
    expect(mockConsole.warn).not.toHaveBeenCalled();
  });

  test('should write at or above warnFrom with warn', () => {
    const sink = createConsoleSink(mockConsole, { warnFrom: 2 });

    sink.write('warning line', 2);
    sink.write('critical line', 3);

    expect(mockConsole.warn).toHaveBeenNthCalledWith(1, 'warning line');
    expect(mockConsole.warn).toHaveBeenNthCalledWith(2, 'critical line');
    expect(mockConsole.log).not.toHaveBeenCalled();
  });
});
