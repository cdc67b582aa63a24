import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { NameserverMonitor } from '../../../src/services/NameserverMonitor.js';
import { PorkbunProvider, PORKBUN_DEFAULT_NAMESERVERS } from '../../../src/providers/porkbun/PorkbunProvider.js';
import { EventBus, EventTypes } from '../../../src/core/EventBus.js';
import { FakePorkbunRegistrar } from '../../helpers/FakePorkbunRegistrar.js';

describe('NameserverMonitor', () => {
  let registrar: FakePorkbunRegistrar;
  let eventBus: EventBus;
  let monitor: NameserverMonitor;
  let updated: ReturnType<typeof vi.fn>;
  let failed: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    registrar = new FakePorkbunRegistrar();
    registrar.addDomain('a.example');
    registrar.addDomain('b.example', [], ['ns1.example.net', 'ns2.example.net']);

    eventBus = new EventBus();
    updated = vi.fn();
    failed = vi.fn();
    eventBus.subscribe(EventTypes.NAMESERVERS_UPDATED, updated);
    eventBus.subscribe(EventTypes.NAMESERVERS_CHECK_FAILED, failed);

    const provider = new PorkbunProvider(registrar, { retryAttempts: 1, backoffBaseMs: 0 });
    monitor = new NameserverMonitor(provider, { pollInterval: 60000, eventBus });
    monitor.setDomains(['a.example', 'B.Example', 'a.example']);
  });

  afterEach(() => {
    monitor.stopPolling();
    vi.useRealTimers();
  });

  it('should dedupe watched domains', () => {
    expect(monitor.getDomains()).toEqual(['a.example', 'b.example']);
  });

  it('should publish every domain on the first poll', async () => {
    await monitor.poll();

    expect(updated).toHaveBeenCalledTimes(2);
    expect(updated).toHaveBeenCalledWith({ domain: 'a.example', nameservers: PORKBUN_DEFAULT_NAMESERVERS, external: false });
    expect(updated).toHaveBeenCalledWith({
      domain: 'b.example',
      nameservers: ['ns1.example.net', 'ns2.example.net'],
      external: true,
    });
    expect(monitor.getSnapshot().get('b.example')?.external).toBe(true);
  });

  it('should only publish changes on later polls', async () => {
    await monitor.poll();
    updated.mockClear();

    registrar.setNameservers('a.example', ['ns2.example.net', 'ns1.example.net']);
    registrar.setNameservers('b.example', ['ns2.example.net', 'ns1.example.net']);
    await monitor.poll();

    expect(updated).toHaveBeenCalledTimes(1);
    expect(updated).toHaveBeenCalledWith({
      domain: 'a.example',
      nameservers: ['ns2.example.net', 'ns1.example.net'],
      external: true,
    });
  });

  it('should publish failures without throwing', async () => {
    registrar.denyApiAccess('b.example');

    await expect(monitor.poll()).resolves.toBeUndefined();

    expect(failed).toHaveBeenCalledWith({ domain: 'b.example', error: 'Domain is not opted in to API access.' });
    expect(monitor.getSnapshot().has('b.example')).toBe(false);
  });

  it('should drop snapshot entries for domains no longer watched', async () => {
    await monitor.poll();

    monitor.setDomains(['a.example']);

    expect([...monitor.getSnapshot().keys()]).toEqual(['a.example']);
  });

  it('should poll on an interval until stopped', async () => {
    vi.useFakeTimers();

    monitor.startPolling();
    expect(monitor.isPolling()).toBe(true);
    await vi.advanceTimersByTimeAsync(0);
    expect(registrar.callsTo('/domain/getNs')).toHaveLength(2);

    await vi.advanceTimersByTimeAsync(60000);
    expect(registrar.callsTo('/domain/getNs')).toHaveLength(4);

    monitor.stopPolling();
    await vi.advanceTimersByTimeAsync(60000);
    expect(registrar.callsTo('/domain/getNs')).toHaveLength(4);
    expect(monitor.isPolling()).toBe(false);
  });
});
