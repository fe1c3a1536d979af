import { describe, expect, it } from 'vitest';
import { defaultHost, HostParseError, parseHostUrl } from '../hostUrl';

describe('parseHostUrl', () => {
  it.each(['', 'foobar', '://missing-scheme', 'localhost:2375'])('rejects %j', (host) => {
    expect(() => parseHostUrl(host)).toThrow(HostParseError);
    expect(() => parseHostUrl(host)).toThrow(`unable to parse host \`${host}\``);
  });

  it('passes arbitrary schemes through', () => {
    expect(parseHostUrl('foo://bar')).toEqual({ scheme: 'foo', host: 'bar', path: '' });
    expect(parseHostUrl('invalid://url')).toEqual({ scheme: 'invalid', host: 'url', path: '' });
  });

  it('parses tcp hosts', () => {
    expect(parseHostUrl('tcp://localhost:2476')).toEqual({ scheme: 'tcp', host: 'localhost:2476', path: '' });
  });

  it('splits the base path from tcp hosts', () => {
    expect(parseHostUrl('tcp://localhost:2476/path')).toEqual({
      scheme: 'tcp',
      host: 'localhost:2476',
      path: '/path',
    });
  });

  it('splits the base path from http and https hosts like tcp hosts', () => {
    expect(parseHostUrl('http://localhost:2375/proxy')).toEqual({
      scheme: 'http',
      host: 'localhost:2375',
      path: '/proxy',
    });
    expect(parseHostUrl('https://engine.example:2376/a/b')).toEqual({
      scheme: 'https',
      host: 'engine.example:2376',
      path: '/a/b',
    });
  });

  it('does not decode the authority', () => {
    expect(parseHostUrl('tcp://host%2Fname:1/a%20b')).toEqual({
      scheme: 'tcp',
      host: 'host%2Fname:1',
      path: '/a%20b',
    });
  });

  it('keeps unix socket paths whole', () => {
    expect(parseHostUrl('unix:///var/run/docker.sock')).toEqual({
      scheme: 'unix',
      host: '/var/run/docker.sock',
      path: '',
    });
  });

  it('keeps named pipe paths whole', () => {
    expect(parseHostUrl('npipe:////./pipe/docker_engine')).toEqual({
      scheme: 'npipe',
      host: '//./pipe/docker_engine',
      path: '',
    });
  });
});

describe('defaultHost', () => {
  it('uses a named pipe on Windows and a unix socket elsewhere', () => {
    expect(defaultHost('win32')).toBe('npipe:////./pipe/docker_engine');
    expect(defaultHost('linux')).toBe('unix:///var/run/docker.sock');
  });
});
