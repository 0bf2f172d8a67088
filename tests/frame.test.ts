import { describe, it, expect } from 'vitest';
import { createFrame, floodBeacon, floodIdOf, frameIdentity, frameToJson, sameContent } from '../src/frame.js';

describe('frames', () => {
  it('are frozen', () => {
    const frame = floodBeacon(1, 0, 'f');
    expect(Object.isFrozen(frame)).toBe(true);
    expect(Object.isFrozen(frame.payload)).toBe(true);
  });

  it('compare by value, independent of payload key order', () => {
    const a = createFrame('FLOOD_BEACON', 1, 0, 3, { kind: 'FloodBeacon', floodId: 'abc' });
    const b = createFrame('FLOOD_BEACON', 1, 0, 3, { floodId: 'abc', kind: 'FloodBeacon' });
    expect(a).not.toBe(b);
    expect(frameIdentity(a)).toBe(frameIdentity(b));
    expect(sameContent([a, b])).toBe(true);
  });

  it('differ when any field or the embedded flood id differs', () => {
    const base = floodBeacon(1, 0, 'abc');
    expect(sameContent([base, floodBeacon(1, 1, 'abc')])).toBe(false);
    expect(sameContent([base, floodBeacon(2, 0, 'abc')])).toBe(false);
    expect(sameContent([base, floodBeacon(1, 0, 'abd')])).toBe(false);
    expect(sameContent([base, createFrame('FLOOD_BEACON', 1, 4, 0, { kind: 'FloodBeacon', floodId: 'abc' })])).toBe(false);
  });

  it('expose the flood id of beacons only', () => {
    expect(floodIdOf(floodBeacon(1, 0, 'abc'))).toBe('abc');
    expect(floodIdOf(createFrame('DATA', 1, 0, 0, { kind: 'Data', body: 'abc' }))).toBeUndefined();
  });

  it('serialize to JSON for log records', () => {
    expect(frameToJson(floodBeacon(4, 2, 'abc'))).toBe(
      '{"type":"FLOOD_BEACON","src":4,"dst":0,"seq":2,"payload":{"kind":"FloodBeacon","floodId":"abc"}}',
    );
  });
});
