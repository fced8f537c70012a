import { homedir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { resolveBaseDir } from './base-dir';

describe('resolveBaseDir', () => {
  it('defaults to ~/.channelterm', () => {
    expect(resolveBaseDir({})).toBe(join(homedir(), '.channelterm'));
  });

  it('treats a blank BASE_DIR as unset', () => {
    expect(resolveBaseDir({ BASE_DIR: '   ' })).toBe(join(homedir(), '.channelterm'));
  });

  it('expands $VAR and ${VAR} references', () => {
    const env = { CHANNELTERM_HOME: '/tmp/chat-home', BASE_DIR: '$CHANNELTERM_HOME/data' };
    expect(resolveBaseDir(env)).toBe('/tmp/chat-home/data');
    expect(resolveBaseDir({ ...env, BASE_DIR: '${CHANNELTERM_HOME}/logs-root' })).toBe(
      '/tmp/chat-home/logs-root'
    );
  });

  it('leaves unknown variables as written', () => {
    expect(resolveBaseDir({ BASE_DIR: '/srv/$MISSING_VAR' })).toBe('/srv/$MISSING_VAR');
  });
});
