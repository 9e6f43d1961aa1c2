import { config } from '../../src/config';
import { resetWarnings, warnOnce } from '../../src/utils/warnings';

describe('warnOnce', () => {
  beforeEach(() => {
    resetWarnings();
  });
  afterEach(() => {
    config.warnings = false;
    jest.restoreAllMocks();
  });

  it('stays silent while warnings are disabled', () => {
    // Arrange
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
    // Act
    warnOnce('test-key', 'first');
    // Assert
    expect(warn).not.toHaveBeenCalled();
  });
  it('emits each key once', () => {
    // Arrange
    config.warnings = true;
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
    // Act
    warnOnce('test-key', 'first');
    warnOnce('test-key', 'second');
    // Assert
    expect(warn.mock.calls).toEqual([['first']]);
  });
  it('emits again after resetWarnings()', () => {
    // Arrange
    config.warnings = true;
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
    warnOnce('test-key', 'first');
    // Act
    resetWarnings();
    warnOnce('test-key', 'again');
    // Assert
    expect(warn).toHaveBeenCalledTimes(2);
  });
});
