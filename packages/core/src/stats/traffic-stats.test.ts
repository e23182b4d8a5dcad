import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { TrafficStats } from './traffic-stats.js';

describe('TrafficStats', () => {
  it('should track packets and bytes sent', () => {
    const stats = new TrafficStats();

    stats.recordPacketSent(1400);
    stats.recordPacketSent(1400, true);

    const result = stats.getStats();
    expect(result.packetsSent).toBe(2);
    expect(result.retransmissions).toBe(1);
    expect(result.bytesSent).toBe(2800);
    expect(result.retransmitRatio).toBe(0.5);
  });

  it('should track received, acknowledged and malformed packets', () => {
    const stats = new TrafficStats();

    stats.recordPacketReceived(1400);
    stats.recordAckSent();
    stats.recordAckReceived();
    stats.recordAckReceived();
    stats.recordMalformed();
    stats.recordDropped();

    expect(stats.getStats()).toMatchObject({
      packetsReceived: 1,
      bytesReceived: 1400,
      acksSent: 1,
      acksReceived: 2,
      malformedPackets: 1,
      packetsDropped: 1,
    });
  });

  it('should count forwarded packets as bytes sent', () => {
    const stats = new TrafficStats();
    stats.recordForwarded(1400);
    expect(stats.getStats()).toMatchObject({ packetsForwarded: 1, packetsSent: 0, bytesSent: 1400 });
  });

  it('should track sessions', () => {
    const stats = new TrafficStats();
    stats.recordSessionOpened();
    stats.recordSessionOpened();
    stats.recordSessionFailed();
    expect(stats.getStats()).toMatchObject({ sessionsOpened: 2, sessionsFailed: 1 });
  });

  it('should report a zero ratio before anything is sent', () => {
    expect(new TrafficStats().getStats().retransmitRatio).toBe(0);
  });

  it('should emit a retransmit warning once the ratio exceeds the threshold', () => {
    const onRetransmitWarning = vi.fn();
    const stats = new TrafficStats({ events: { onRetransmitWarning } });

    for (let i = 0; i < 20; i++) stats.recordPacketSent(1400);
    // 20 retransmissions out of 40 packets: at threshold
    for (let i = 0; i < 20; i++) stats.recordPacketSent(1400, true);
    expect(onRetransmitWarning).not.toHaveBeenCalled();

    stats.recordPacketSent(1400, true);
    expect(onRetransmitWarning).toHaveBeenCalledOnce();
    expect(onRetransmitWarning.mock.calls[0]?.[1]).toBe('retransmit ratio 0.51 exceeds threshold 0.5');
  });

  it('should not warn on a small sample', () => {
    const onRetransmitWarning = vi.fn();
    const stats = new TrafficStats({ events: { onRetransmitWarning } });

    for (let i = 0; i < 10; i++) stats.recordPacketSent(1400, true);
    expect(onRetransmitWarning).not.toHaveBeenCalled();
  });

  it('should track timestamps', () => {
    const stats = new TrafficStats();
    const before = Date.now();
    stats.recordPacketSent(10);
    stats.recordPacketReceived(10);
    const result = stats.getStats();
    expect(result.lastSendTimestamp).toBeGreaterThanOrEqual(before);
    expect(result.lastReceiveTimestamp).toBeGreaterThanOrEqual(before);
  });

  it('should reset all counters', () => {
    const stats = new TrafficStats();
    stats.recordPacketSent(1400, true);
    stats.recordMalformed();
    stats.reset();

    const result = stats.getStats();
    expect(result.packetsSent).toBe(0);
    expect(result.malformedPackets).toBe(0);
    expect(result.lastSendTimestamp).toBe(0);
  });

  describe('warning cooldown', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should not repeat warnings within the cooldown', () => {
      const onRetransmitWarning = vi.fn();
      const stats = new TrafficStats({ retransmitThreshold: 0.1, events: { onRetransmitWarning } });

      for (let i = 0; i < 30; i++) stats.recordPacketSent(1400, true);
      expect(onRetransmitWarning).toHaveBeenCalledOnce();

      vi.advanceTimersByTime(10_000);
      stats.recordPacketSent(1400, true);
      expect(onRetransmitWarning).toHaveBeenCalledTimes(2);
    });
  });
});
