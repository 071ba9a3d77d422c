import { parseAuthParams, parseBearerChallenge, scopeFor } from './challenge';

describe('parseBearerChallenge', () => {
  test('parses Docker Hub style challenges', () => {
    const challenge = parseBearerChallenge(
      'Bearer realm="https://auth.docker.io/token",service="registry.docker.io",scope="repository:library/ubuntu:pull"'
    );

    expect(challenge).toEqual({
      realm: 'https://auth.docker.io/token',
      service: 'registry.docker.io',
      scope: 'repository:library/ubuntu:pull',
    });
  });

  test('keeps commas inside quoted values', () => {
    expect(parseBearerChallenge('bearer realm="https://r.example.com/t", scope="repository:a/b:pull,push"')).toEqual({
      realm: 'https://r.example.com/t',
      service: undefined,
      scope: 'repository:a/b:pull,push',
    });
  });

  test('returns null for other schemes or a missing realm', () => {
    expect(parseBearerChallenge(undefined)).toBeNull();
    expect(parseBearerChallenge('Basic realm="registry"')).toBeNull();
    expect(parseBearerChallenge('Bearer service="registry.docker.io"')).toBeNull();
    expect(parseBearerChallenge('Bearer')).toBeNull();
  });
});

describe('parseAuthParams', () => {
  test('accepts unquoted tokens and escaped quotes', () => {
    expect(parseAuthParams('Realm=plain, error="say \\"hi\\""')).toEqual({
      realm: 'plain',
      error: 'say "hi"',
    });
  });
});

describe('scopeFor', () => {
  test('asks for pull on reads and push otherwise', () => {
    expect(scopeFor('library/ubuntu', 'GET')).toBe('repository:library/ubuntu:pull');
    expect(scopeFor('library/ubuntu', 'HEAD')).toBe('repository:library/ubuntu:pull');
    expect(scopeFor('me/app', 'PUT')).toBe('repository:me/app:pull,push');
  });
});
