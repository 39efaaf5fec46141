import { presentStatus } from './status-presentation';

describe('presentStatus', () => {
  it('should present healthy as success', () => {
    expect(presentStatus('healthy')).toEqual({
      status: 'healthy',
      tone: 'success',
      icon: '✓',
      label: 'healthy',
    });
  });

  it('should present unhealthy as danger', () => {
    expect(presentStatus('unhealthy')).toEqual({
      status: 'unhealthy',
      tone: 'danger',
      icon: '✗',
      label: 'unhealthy',
    });
  });

  it('should present error as warning', () => {
    expect(presentStatus('error')).toEqual({
      status: 'error',
      tone: 'warning',
      icon: '⚠',
      label: 'error',
    });
  });

  it('should ignore case', () => {
    expect(presentStatus('Healthy').tone).toBe('success');
    expect(presentStatus('UNHEALTHY').tone).toBe('danger');
  });

  it.each([['degraded'], ['ok'], [''], [undefined], [null], [0], [[]], [{}], [Symbol('status')]])(
    'should fall back to the neutral presentation for %p',
    (value) => {
      expect(presentStatus(value)).toEqual({
        status: 'unknown',
        tone: 'neutral',
        icon: '⏺',
        label: 'unknown',
      });
    },
  );
});
