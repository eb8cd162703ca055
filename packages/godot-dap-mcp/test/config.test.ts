import { expect } from 'chai';
import { LOG_FILE_ENV, LOG_LEVEL_ENV, parseConfig } from '../src/config';

describe('parseConfig', () => {
  it('falls back to the built-in defaults', () => {
    expect(parseConfig([], {}, '0.1.0')).to.deep.equal({
      host: '127.0.0.1',
      port: 6006,
      connectTimeoutMs: 10000,
      commandTimeoutMs: 30000,
      logLevel: 'info',
      logFile: undefined,
    });
  });

  it('reads flags', () => {
    const config = parseConfig(
      [
        '--host',
        '10.0.0.5',
        '-p',
        '6010',
        '--connect-timeout',
        '500',
        '--command-timeout',
        '2000',
      ],
      {},
      '0.1.0',
    );
    expect(config.host).to.equal('10.0.0.5');
    expect(config.port).to.equal(6010);
    expect(config.connectTimeoutMs).to.equal(500);
    expect(config.commandTimeoutMs).to.equal(2000);
  });

  it('takes logging settings from the environment', () => {
    const config = parseConfig(
      [],
      { [LOG_LEVEL_ENV]: 'debug', [LOG_FILE_ENV]: '/tmp/godot-dap.log' },
      '0.1.0',
    );
    expect(config.logLevel).to.equal('debug');
    expect(config.logFile).to.equal('/tmp/godot-dap.log');
  });

  it('lets flags override the environment', () => {
    const config = parseConfig(
      ['--log-level', 'warn'],
      { [LOG_LEVEL_ENV]: 'debug' },
      '0.1.0',
    );
    expect(config.logLevel).to.equal('warn');
  });

  it('ignores an unknown level in the environment', () => {
    const config = parseConfig([], { [LOG_LEVEL_ENV]: 'verbose' }, '0.1.0');
    expect(config.logLevel).to.equal('info');
  });

  it('rejects an out-of-range port', () => {
    expect(() => parseConfig(['--port', '70000'], {}, '0.1.0')).to.throw(
      'Invalid port: 70000',
    );
  });

  it('rejects a non-positive timeout', () => {
    expect(() => parseConfig(['--command-timeout', '0'], {}, '0.1.0')).to.throw(
      'Timeouts must be positive numbers of milliseconds.',
    );
  });

  it('rejects unknown flags', () => {
    expect(() => parseConfig(['--verbose'], {}, '0.1.0')).to.throw(Error);
  });
});
