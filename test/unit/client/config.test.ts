/* eslint-env mocha */
/* global describe, it */
import { expect } from 'chai';

import { loadClientConfig } from '../../../src/client/config';
import { ConfigError } from '../../../src/client/errors';

function configError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected a ConfigError');
}

describe('loadClientConfig', () => {
  it('reads settings from the environment', () => {
    const config = loadClientConfig({
      EVE_HOST: 'https://lab.test/',
      EVE_USER: 'admin',
      EVE_PASSWORD: 'test-secret',
    });
    expect(config).to.deep.equal({ host: 'https://lab.test', username: 'admin', password: 'test-secret' });
  });

  it('prefers explicit overrides', () => {
    const config = loadClientConfig(
      { EVE_HOST: 'https://lab.test', EVE_USER: 'admin', EVE_PASSWORD: 'test-secret' },
      { host: 'http://other.test', username: 'operator' }
    );
    expect(config).to.deep.equal({ host: 'http://other.test', username: 'operator', password: 'test-secret' });
  });

  it('lists every missing setting', () => {
    const err = configError(() => loadClientConfig({ EVE_USER: 'admin' }));
    expect(err.problems).to.deep.equal([
      'missing lab API host: set host or the EVE_HOST environment variable',
      'missing lab API password: set password or the EVE_PASSWORD environment variable',
    ]);
    expect(err.message).to.equal(
      'Invalid lab API configuration: missing lab API host: set host or the EVE_HOST environment variable; ' +
        'missing lab API password: set password or the EVE_PASSWORD environment variable'
    );
  });

  it('treats an empty variable as missing', () => {
    const err = configError(() => loadClientConfig({ EVE_HOST: 'https://lab.test', EVE_USER: '', EVE_PASSWORD: 'x' }));
    expect(err.problems).to.deep.equal(['missing lab API username: set username or the EVE_USER environment variable']);
  });

  it('rejects a host without an http scheme', () => {
    const err = configError(() =>
      loadClientConfig({ EVE_HOST: 'ftp://lab.test', EVE_USER: 'admin', EVE_PASSWORD: 'test-secret' })
    );
    expect(err.problems).to.deep.equal(['/host must match pattern "^https?://"']);
  });
});
