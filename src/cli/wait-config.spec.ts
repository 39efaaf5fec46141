import { accessUrls, defaultTargets, loadWaitConfig, parseTargetFlag } from './wait-config';

describe('loadWaitConfig', () => {
  it('should apply defaults to an empty environment', () => {
    expect(loadWaitConfig({})).toEqual({
      host: 'localhost',
      apiPort: 8080,
      frontendPort: 3000,
      maxWaitMs: 60000,
      intervalMs: 2000,
      requestTimeoutMs: 5000,
      verbose: false,
    });
  });

  it('should convert second-based values to milliseconds', () => {
    const config = loadWaitConfig({ MAX_WAIT: '6', CHECK_INTERVAL: '0.5', REQUEST_TIMEOUT: '1', VERBOSE: 'true' });

    expect(config.maxWaitMs).toBe(6000);
    expect(config.intervalMs).toBe(500);
    expect(config.requestTimeoutMs).toBe(1000);
    expect(config.verbose).toBe(true);
  });

  it('should reject a zero check interval', () => {
    expect(() => loadWaitConfig({ CHECK_INTERVAL: '0' })).toThrow(/^Invalid wait configuration: /);
  });

  it('should reject a port outside the valid range', () => {
    expect(() => loadWaitConfig({ API_PORT: '70000' })).toThrow(/"API_PORT"/);
  });
});

describe('defaultTargets', () => {
  it('should build the four default targets', () => {
    expect(defaultTargets({ host: 'stack.local', apiPort: 9000, frontendPort: 3001 })).toEqual([
      { name: 'API', url: 'http://stack.local:9000/health' },
      { name: 'Frontend', url: 'http://stack.local:3001/' },
      { name: 'Database', url: 'http://stack.local:9000/api/health/db' },
      { name: 'Redis', url: 'http://stack.local:9000/api/health/redis' },
    ]);
  });
});

describe('accessUrls', () => {
  it('should list the application entry points', () => {
    expect(accessUrls({ host: 'stack.local', apiPort: 9000, frontendPort: 3001 })).toEqual([
      'Frontend: http://stack.local:3001',
      'API: http://stack.local:9000',
      'API Info: http://stack.local:9000/api',
    ]);
  });
});

describe('parseTargetFlag', () => {
  it('should split on the first equals sign', () => {
    expect(parseTargetFlag('search=http://localhost:9200/_cluster/health?wait=1')).toEqual({
      name: 'search',
      url: 'http://localhost:9200/_cluster/health?wait=1',
    });
  });

  it('should reject a value without a name', () => {
    expect(() => parseTargetFlag('=http://localhost')).toThrow('Invalid target "=http://localhost": expected name=url');
  });

  it('should reject a malformed URL', () => {
    expect(() => parseTargetFlag('api=not a url')).toThrow('Invalid target "api=not a url": "not a url" is not a URL');
  });

  it('should reject non-http schemes', () => {
    expect(() => parseTargetFlag('db=postgres://localhost:5432')).toThrow('only http and https are supported');
  });
});
