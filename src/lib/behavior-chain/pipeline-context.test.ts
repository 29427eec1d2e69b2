import { describe, expect, it } from 'vitest';
import { sleep } from '../sleep';
import { CancelledFailure, TimeoutFailure } from './errors';
import { CANCELLED_AT_PROPERTY, PipelineContext } from './pipeline-context';

describe('PipelineContext', () => {
  it('carries the message and an empty result', () => {
    const context = new PipelineContext({ message: { path: '/orders' } });

    expect(context.message).toEqual({ path: '/orders' });
    expect(context.result).toBeUndefined();
    expect(context.contextId).toHaveLength(26);
  });

  it('gives every context its own id', () => {
    const a = new PipelineContext({ message: 1 });
    const b = new PipelineContext({ message: 2 });

    expect(a.contextId).not.toBe(b.contextId);
  });

  describe('properties', () => {
    it('treats keys case-insensitively and keeps the first spelling', () => {
      const context = new PipelineContext({
        message: null,
        properties: { TenantId: 'acme' },
      });

      context.setProperty('tenantid', 'globex');

      expect(context.getProperty('TENANTID')).toBe('globex');
      expect(context.hasProperty('tenantId')).toBe(true);
      expect(context.propertyKeys()).toEqual(['TenantId']);
    });

    it('removes properties', () => {
      const context = new PipelineContext({ message: null });
      context.setProperty('Trace', 'abc');

      expect(context.removeProperty('trace')).toBe(true);
      expect(context.removeProperty('trace')).toBe(false);
      expect(context.getProperty('Trace')).toBeUndefined();
    });
  });

  describe('cancel', () => {
    it('aborts the signal and records the failure once', () => {
      const context = new PipelineContext({ message: null });

      expect(context.cancel('shutdown')).toBe(true);
      expect(context.cancel('again')).toBe(false);

      expect(context.isCancelled).toBe(true);
      expect(context.signal.aborted).toBe(true);
      expect(context.failure).toBeInstanceOf(CancelledFailure);
      expect(context.failure?.additionalInfo).toEqual({
        contextId: context.contextId,
        reason: 'shutdown',
      });
      expect(typeof context.getProperty(CANCELLED_AT_PROPERTY)).toBe('number');
    });

    it('throws the failure from throwIfCancelled', () => {
      const context = new PipelineContext({ message: null });

      expect(() => context.throwIfCancelled()).not.toThrow();

      context.cancel();

      expect(() => context.throwIfCancelled()).toThrow(CancelledFailure);
    });

    it('follows a parent signal', () => {
      const parent = new AbortController();
      const context = new PipelineContext({ message: null, signal: parent.signal });

      parent.abort('request closed');

      expect(context.isCancelled).toBe(true);
      expect(context.failure?.message).toBe('Chain execution cancelled: request closed');
    });

    it('starts cancelled when the parent already aborted', () => {
      const parent = new AbortController();
      parent.abort();

      expect(new PipelineContext({ message: null, signal: parent.signal }).isCancelled).toBe(
        true,
      );
    });

    it('stops following the parent after dispose', () => {
      const parent = new AbortController();
      const context = new PipelineContext({ message: null, signal: parent.signal });

      context.dispose();
      parent.abort();

      expect(context.isCancelled).toBe(false);
    });
  });

  describe('narrowDeadline', () => {
    it('expires with a TimeoutFailure', async () => {
      const context = new PipelineContext({ message: null });
      context.narrowDeadline(10);

      await sleep(50);

      expect(context.failure).toBeInstanceOf(TimeoutFailure);
      expect(context.failure?.additionalInfo).toMatchObject({ timeoutMS: 10 });
    });

    it('only moves the deadline earlier', () => {
      const context = new PipelineContext({ message: null });
      const restoreOuter = context.narrowDeadline(1000);
      const outer = context.deadlineAt;
      const restoreLater = context.narrowDeadline(5000);

      expect(context.deadlineAt).toBe(outer);

      restoreLater();
      restoreOuter();
      context.dispose();
    });

    it('restores the previous deadline', () => {
      const context = new PipelineContext({ message: null });
      const restoreOuter = context.narrowDeadline(5000);
      const outer = context.deadlineAt;
      const restoreInner = context.narrowDeadline(100);

      expect(context.deadlineAt).toBeLessThan(outer ?? 0);

      restoreInner();
      expect(context.deadlineAt).toBe(outer);

      restoreOuter();
      expect(context.deadlineAt).toBeUndefined();
      expect(context.remainingMS).toBeUndefined();
    });

    it('does not expire once restored', async () => {
      const context = new PipelineContext({ message: null });
      const restore = context.narrowDeadline(10);
      restore();

      await sleep(30);

      expect(context.isCancelled).toBe(false);
    });

    it('rejects invalid timeouts', () => {
      const context = new PipelineContext({ message: null });

      expect(() => context.narrowDeadline(-1)).toThrow(TypeError);
      expect(() => context.narrowDeadline(Number.NaN)).toThrow(TypeError);
    });
  });

  it('measures elapsed time between markStart and markEnd', async () => {
    const context = new PipelineContext({ message: null });

    expect(context.elapsedMS).toBe(0);

    context.markStart();
    await sleep(15);
    context.markEnd();

    expect(context.elapsedMS).toBeGreaterThanOrEqual(10);
  });
});
