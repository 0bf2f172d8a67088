import { describe, it, expect } from 'vitest';
import { FloodInitiator, FloodRelay } from '../src/flood.js';
import { floodBeacon } from '../src/frame.js';
import { collectResults } from '../src/results.js';
import { Recorder, addNode, createNet, sequenceRng } from './helpers/network.js';

describe('flooding', () => {
  it('starts a flood at the start time and relays it one guard time after reception', () => {
    const { rng } = sequenceRng([0.5]);
    const net = createNet(rng, 0);
    const initiator = new FloodInitiator(rng, 100);
    const sink = addNode(net, 1, 0, 0, { guardTime: 100, maxTransmissions: 1 }, initiator);
    const sensor = addNode(net, 2, 1, 0, { guardTime: 100, maxTransmissions: 1 }, new FloodRelay());
    sink.start();
    sensor.start();

    net.scheduler.runUntilIdle();

    const floodId = '8'.repeat(32);
    expect(initiator.sequenceNumber).toBe(0);
    expect([...sink.floodBeaconIds]).toEqual([floodId]);
    expect([...(sink.floodBeaconTimes.get(floodId) ?? [])]).toEqual([100]);
    expect([...(sensor.floodBeaconTimes.get(floodId) ?? [])]).toEqual([100]);
    // sink: initial send + one retransmission; sensor: one relay
    expect(sink.localTxCount).toBe(2);
    expect(sensor.localTxCount).toBe(1);

    const results = collectResults(
      { maxTransmissions: 1, lossRate: 0, guardTime: 100, seed: 0, maxHops: 1 },
      net.registry.nodes(),
    );
    expect(results.floodSuccess).toBe(true);
    expect(results.completionTime).toBe(100);
    expect(results.totalTransmissions).toBe(3);
  });

  it('relays a new flood maxTransmissions times, a guard time apart', () => {
    const { rng } = sequenceRng([0.5]);
    const net = createNet(rng, 0);
    const relay = addNode(net, 2, 0, 0, { guardTime: 50, maxTransmissions: 3 }, new FloodRelay());
    const probeRecorder = new Recorder();
    const probe = addNode(net, 3, 1, 0, { guardTime: 1 }, probeRecorder);
    relay.start();
    probe.start();

    const beacon = floodBeacon(1, 0, 'f');
    net.scheduler.scheduleAfter(10, () => probe.send(beacon));
    net.scheduler.runUntilIdle();

    expect(relay.localTxCount).toBe(3);
    expect(net.medium.stats.transmissions).toBe(4);
    expect(probeRecorder.frames.map(r => r.clock)).toEqual([60, 110, 160]);
    // relays forward the frame unchanged
    expect(probeRecorder.frames.every(r => r.frame === beacon)).toBe(true);
  });

  it('ignores floods it has already seen', () => {
    const { rng } = sequenceRng([0.5]);
    const net = createNet(rng, 0);
    const relay = addNode(net, 2, 0, 0, { guardTime: 50, maxTransmissions: 1 }, new FloodRelay());
    const probe = addNode(net, 3, 1, 0, { guardTime: 1 });
    relay.start();

    const beacon = floodBeacon(1, 0, 'f');
    net.scheduler.scheduleAfter(10, () => probe.send(beacon));
    net.scheduler.scheduleAfter(200, () => probe.send(beacon));
    net.scheduler.runUntilIdle();

    expect(relay.localTxCount).toBe(1);
    expect([...(relay.floodBeaconTimes.get('f') ?? [])]).toEqual([10, 200]);
  });
});
