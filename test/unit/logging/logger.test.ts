/* eslint-env mocha */
/* global describe, it, beforeEach, afterEach */
import { expect } from 'chai';
import sinon from 'sinon';

import { getLogLevel, log, setLogLevel } from '../../../src/logging/logger';
import { formatMessage, isLogLevel } from '../../../src/logging/loggerUtils';
import type { LogLevel } from '../../../src/logging/loggerUtils';

describe('logger', () => {
  let previous: LogLevel;
  let info: sinon.SinonStub;
  let warn: sinon.SinonStub;

  beforeEach(() => {
    previous = getLogLevel();
    info = sinon.stub(console, 'info');
    warn = sinon.stub(console, 'warn');
  });

  afterEach(() => {
    sinon.restore();
    setLogLevel(previous);
  });

  it('prefixes messages with the calling file and line', () => {
    setLogLevel('info');
    log.info('link r1 created');

    expect(info.calledOnce).to.equal(true);
    expect(info.firstCall.args[0]).to.match(/^logger\.test\.ts:\d+ - link r1 created$/);
  });

  it('drops messages below the threshold', () => {
    setLogLevel('warn');
    log.info('hidden');
    log.warn('shown');

    expect(info.called).to.equal(false);
    expect(warn.calledOnce).to.equal(true);
  });

  it('formats errors and objects', () => {
    expect(formatMessage(new Error('boom'))).to.equal('boom');
    expect(formatMessage({ id: 3 })).to.equal('{"id":3}');
    expect(formatMessage(42)).to.equal('42');
  });

  it('recognises log levels', () => {
    expect(isLogLevel('debug')).to.equal(true);
    expect(isLogLevel('trace')).to.equal(false);
  });
});
