import { afterEach, describe, expect, it, vi } from 'vitest';
import { classifyConnection, NetworkMonitor } from './NetworkMonitor';

describe('classifyConnection', () => {
  it('reports None while disconnected', () => {
    expect(classifyConnection(false, ['WiFi'])).toBe('None');
  });

  it('takes the best available link', () => {
    expect(classifyConnection(true, ['Cellular', 'WiFi'])).toBe('Excellent');
    expect(classifyConnection(true, ['Bluetooth'])).toBe('Fair');
    expect(classifyConnection(true, ['Cellular'])).toBe('Good');
  });

  it('falls back to Poor for unknown links', () => {
    expect(classifyConnection(true, [])).toBe('Poor');
    expect(classifyConnection(true, ['Unknown'])).toBe('Poor');
  });
});

describe('NetworkMonitor', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('starts disconnected by default', () => {
    const monitor = new NetworkMonitor();

    expect(monitor.isConnected).toBe(false);
    expect(monitor.quality).toBe('None');
  });

  it('only allows authentication while offline', () => {
    const monitor = new NetworkMonitor();

    expect(monitor.shouldAttemptOperation('Authentication')).toBe(true);
    expect(monitor.shouldAttemptOperation('LocationSync')).toBe(false);
    expect(monitor.shouldAttemptOperation('ClockEvent')).toBe(false);
  });

  it('gates operation classes by link quality', () => {
    const cellular = new NetworkMonitor({ isConnected: true, connectionTypes: ['Cellular'] });
    const bluetooth = new NetworkMonitor({ isConnected: true, connectionTypes: ['Bluetooth'] });
    const unknown = new NetworkMonitor({ isConnected: true, connectionTypes: ['Unknown'] });

    expect(cellular.shouldAttemptOperation('PhotoUpload')).toBe(true);
    expect(cellular.shouldAttemptOperation('DataDownload')).toBe(true);

    expect(bluetooth.shouldAttemptOperation('PhotoUpload')).toBe(false);
    expect(bluetooth.shouldAttemptOperation('ClockEvent')).toBe(true);
    expect(bluetooth.shouldAttemptOperation('ReportSync')).toBe(true);

    expect(unknown.shouldAttemptOperation('ClockEvent')).toBe(false);
    expect(unknown.shouldAttemptOperation('LocationSync')).toBe(true);
    expect(unknown.shouldAttemptOperation('CheckpointSync')).toBe(true);
  });

  it('notifies listeners on transitions only', () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const monitor = new NetworkMonitor();
    const changes: boolean[] = [];
    monitor.onConnectivityChange((isConnected) => changes.push(isConnected));

    monitor.setStatus(true, ['WiFi']);
    monitor.setStatus(true, ['Cellular']);
    monitor.setStatus(false);

    expect(changes).toEqual([true, false]);
    expect(monitor.connectionTypes).toEqual([]);
  });

  it('keeps notifying when a listener throws', () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const monitor = new NetworkMonitor();
    const seen: boolean[] = [];
    monitor.onConnectivityChange(() => {
      throw new Error('listener failed');
    });
    monitor.onConnectivityChange((isConnected) => seen.push(isConnected));

    monitor.setStatus(true, ['WiFi']);

    expect(seen).toEqual([true]);
    expect(error).toHaveBeenCalledTimes(1);
  });

  it('stops notifying after unsubscribe', () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const monitor = new NetworkMonitor();
    const listener = vi.fn();
    const unsubscribe = monitor.onConnectivityChange(listener);

    unsubscribe();
    monitor.setStatus(true, ['WiFi']);

    expect(listener).not.toHaveBeenCalled();
  });
});
