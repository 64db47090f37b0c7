import { defineConfig, env } from './config';

describe('defineConfig', () => {
  it('returns valid options unchanged', () => {
    const options = {
      connections: { main: { filename: ':memory:' } },
      entities: [],
    };

    expect(defineConfig(options)).toBe(options);
  });

  it('requires at least one connection', () => {
    expect(() => defineConfig({ connections: {}, entities: [] })).toThrow(
      'DataSourceOptions.connections must define at least one connection.',
    );
  });

  it('requires a filename per connection', () => {
    expect(() => defineConfig({ connections: { main: { filename: '' } }, entities: [] })).toThrow(
      'DataSourceOptions.connections.main.filename is required.',
    );
  });

  it('requires the default connection to be configured', () => {
    expect(() =>
      defineConfig({
        connections: { main: { filename: ':memory:' } },
        defaultConnection: 'replica',
        entities: [],
      }),
    ).toThrow('DataSourceOptions.defaultConnection "replica" is not one of the configured connections: main');
  });
});

describe('env', () => {
  const name = 'RELATIONAL_MODEL_TEST_FILE';

  afterEach(() => {
    delete process.env[name];
  });

  it('reads a set variable', () => {
    process.env[name] = 'test.db';
    expect(env(name)).toBe('test.db');
  });

  it('falls back to the default', () => {
    expect(env(name, ':memory:')).toBe(':memory:');
  });

  it('throws for a missing variable without default', () => {
    expect(() => env(name)).toThrow(`Missing required environment variable: ${name}`);
  });
});
