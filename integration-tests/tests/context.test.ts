/**
 * Request Context Tests
 */

import { getContext, getCorrelationId, runWithContext } from '@medparse/shared';

describe('request context', () => {
  it('should expose the correlation id and content type inside a run', () => {
    runWithContext({ correlationId: 'req-1', contentType: 'application/pdf' }, () => {
      expect(getCorrelationId()).toBe('req-1');
      expect(getContext()?.contentType).toBe('application/pdf');
    });
  });

  it('should keep the context across awaits in an async function', async () => {
    const seen = await runWithContext({ correlationId: 'req-2' }, async () => {
      await new Promise((resolve) => setTimeout(resolve, 1));
      return getCorrelationId();
    });

    expect(seen).toBe('req-2');
  });

  it('should not leak a context out of its run', () => {
    runWithContext({ correlationId: 'req-3' }, () => undefined);

    expect(getContext()).toBeUndefined();
    expect(getCorrelationId()).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
  });

  it('should give a fresh id per call outside a request', () => {
    expect(getCorrelationId()).not.toBe(getCorrelationId());
  });
});
