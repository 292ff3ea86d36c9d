import { describe, it, expect } from '@jest/globals';
import type { Coordinate, WalkRoute } from '@walkloop/domain';
import {
  StreetRouteBuilder,
  explorationWaypoints,
  loopWaypoints,
  outAndBackDestinations,
} from '../street-route-builder.js';
import { FakeDirections, noRoute, straightLeg } from './fake-directions.js';

const START: Coordinate = { lat: 50.7192, lng: -1.8808 };
const LNG_SCALE = 111_000 * Math.cos((START.lat * Math.PI) / 180);

function cues(route: WalkRoute | null): Array<[number, string]> {
  const out: Array<[number, string]> = [];
  route?.points.forEach((p, i) => {
    if (p.instruction !== undefined) out.push([i, p.instruction]);
  });
  return out;
}

describe('waypoint geometry', () => {
  it('places six loop waypoints on a circle, the first due north', () => {
    const radius = 3000 / (2 * Math.PI);
    const waypoints = loopWaypoints(START, 3000, 'clockwise');

    expect(waypoints).toHaveLength(6);
    expect(waypoints[0]?.lat).toBeCloseTo(START.lat + radius / 111_000, 10);
    expect(waypoints[0]?.lng).toBeCloseTo(START.lng, 10);
  });

  it('mirrors the counterclockwise loop east to west', () => {
    const cw = loopWaypoints(START, 3000, 'clockwise');
    const ccw = loopWaypoints(START, 3000, 'counterclockwise');

    // second waypoint: 60° east of north vs 60° west of north
    expect(ccw[1]?.lat).toBeCloseTo(cw[1]?.lat ?? NaN, 10);
    expect((ccw[1]?.lng ?? NaN) - START.lng).toBeCloseTo(START.lng - (cw[1]?.lng ?? NaN), 10);
  });

  it('offers N, E, S, W turnaround points at the given distance', () => {
    const [north, east, south, west] = outAndBackDestinations(START, 1500);

    expect(north?.lat).toBeCloseTo(START.lat + 1500 / 111_000, 10);
    expect(east?.lng).toBeCloseTo(START.lng + 1500 / LNG_SCALE, 10);
    expect(south?.lat).toBeCloseTo(START.lat - 1500 / 111_000, 10);
    expect(west?.lng).toBeCloseTo(START.lng - 1500 / LNG_SCALE, 10);
  });

  it('starts the exploration at the start and adds three diagonals', () => {
    const radius = 3000 / (3 * Math.PI);
    const waypoints = explorationWaypoints(START, 3000);

    expect(waypoints).toHaveLength(4);
    expect(waypoints[0]).toEqual(START);
    // north-east diagonal
    expect(waypoints[1]?.lat).toBeCloseTo(START.lat + (radius * Math.SQRT1_2) / 111_000, 10);
    expect(waypoints[1]?.lng).toBeCloseTo(START.lng + (radius * Math.SQRT1_2) / LNG_SCALE, 10);
  });
});

describe('StreetRouteBuilder.loop', () => {
  it('stitches six legs back to the first waypoint and sums their totals', async () => {
    const directions = new FakeDirections();
    const route = await new StreetRouteBuilder(directions).loop({ start: START, targetDistanceM: 3000 }, 'clockwise');

    expect(directions.calls).toHaveLength(6);
    const waypoints = loopWaypoints(START, 3000, 'clockwise');
    expect(directions.calls[5]).toEqual({ from: waypoints[5], to: waypoints[0] });

    expect(route?.name).toBe('Neighborhood Loop');
    expect(route?.points).toHaveLength(18);
    expect(route?.estimatedDistanceM).toBe(600);
    expect(route?.estimatedDurationSec).toBe(420);
    expect(route?.estimatedSteps).toBe(780);
    expect(route?.points[17]?.coordinate).toEqual(waypoints[0]);
  });

  it('cues the start, each new leg and the finish', async () => {
    const route = await new StreetRouteBuilder(new FakeDirections()).loop(
      { start: START, targetDistanceM: 3000 },
      'counterclockwise',
    );

    expect(route?.name).toBe('Counter Loop');
    expect(cues(route)).toEqual([
      [0, 'Start your walk'],
      [3, 'Continue to next waypoint'],
      [6, 'Continue to next waypoint'],
      [9, 'Continue to next waypoint'],
      [12, 'Continue to next waypoint'],
      [15, 'Continue to next waypoint'],
      [17, "You're back at the start!"],
    ]);
  });

  it('skips a failed leg and keeps the rest', async () => {
    const directions = new FakeDirections((from, to, call) => (call === 2 ? noRoute(from, to, call) : straightLeg(from, to, call)));
    const route = await new StreetRouteBuilder(directions).loop({ start: START, targetDistanceM: 3000 }, 'clockwise');

    expect(directions.calls).toHaveLength(6);
    expect(route?.points).toHaveLength(15);
    expect(route?.estimatedDistanceM).toBe(500);
    expect(route?.estimatedSteps).toBe(650);
  });

  it('leaves the finish cue off when the leg back to the start fails', async () => {
    const directions = new FakeDirections((from, to, call) => (call === 5 ? noRoute(from, to, call) : straightLeg(from, to, call)));
    const route = await new StreetRouteBuilder(directions).loop({ start: START, targetDistanceM: 3000 }, 'clockwise');
    const waypoints = loopWaypoints(START, 3000, 'clockwise');

    expect(route?.points).toHaveLength(15);
    expect(route?.points[14]).toEqual({ coordinate: waypoints[5] });
    expect(cues(route)).toEqual([
      [0, 'Start your walk'],
      [3, 'Continue to next waypoint'],
      [6, 'Continue to next waypoint'],
      [9, 'Continue to next waypoint'],
      [12, 'Continue to next waypoint'],
    ]);
  });

  it('cues a waypoint, not the start, when the first leg fails', async () => {
    const directions = new FakeDirections((from, to, call) => (call === 0 ? noRoute(from, to, call) : straightLeg(from, to, call)));
    const route = await new StreetRouteBuilder(directions).loop({ start: START, targetDistanceM: 3000 }, 'clockwise');

    expect(cues(route)).toEqual([
      [0, 'Continue to next waypoint'],
      [3, 'Continue to next waypoint'],
      [6, 'Continue to next waypoint'],
      [9, 'Continue to next waypoint'],
      [14, "You're back at the start!"],
    ]);
  });

  it('yields null when every leg fails', async () => {
    const route = await new StreetRouteBuilder(new FakeDirections(noRoute)).loop(
      { start: START, targetDistanceM: 3000 },
      'clockwise',
    );
    expect(route).toBeNull();
  });

  it('stops looking up legs once the signal is aborted', async () => {
    const abort = new AbortController();
    const directions = new FakeDirections((from, to, call) => {
      if (call === 1) abort.abort();
      return straightLeg(from, to, call);
    });

    const route = await new StreetRouteBuilder(directions).loop(
      { start: START, targetDistanceM: 3000, signal: abort.signal },
      'clockwise',
    );

    expect(directions.calls).toHaveLength(2);
    expect(route).toBeNull();
  });
});

describe('StreetRouteBuilder.outAndBack', () => {
  it('walks to the northern turnaround and back without repeating it', async () => {
    const directions = new FakeDirections();
    const route = await new StreetRouteBuilder(directions).outAndBack({ start: START, targetDistanceM: 3000 });
    const [north] = outAndBackDestinations(START, 1500);

    expect(directions.calls).toEqual([
      { from: START, to: north },
      { from: north, to: START },
    ]);
    expect(route?.points).toHaveLength(5);
    expect(route?.points[2]?.coordinate).toEqual(north);
    expect(route?.points[4]?.coordinate).toEqual(START);
    expect(route?.estimatedDistanceM).toBe(200);
    expect(route?.estimatedDurationSec).toBe(140);
    expect(route?.estimatedSteps).toBe(260);
    expect(cues(route)).toEqual([
      [0, 'Head out on your route'],
      [2, 'Turnaround point reached'],
      [4, "You're back where you started!"],
    ]);
  });

  it('keeps the outbound leg when the return lookup fails', async () => {
    const directions = new FakeDirections((from, to, call) => (call === 1 ? noRoute(from, to, call) : straightLeg(from, to, call)));
    const route = await new StreetRouteBuilder(directions).outAndBack({ start: START, targetDistanceM: 3000 });

    expect(route?.points).toHaveLength(3);
    expect(route?.estimatedDistanceM).toBe(100);
  });

  it('yields null when both legs fail', async () => {
    const route = await new StreetRouteBuilder(new FakeDirections(noRoute)).outAndBack({
      start: START,
      targetDistanceM: 3000,
    });
    expect(route).toBeNull();
  });
});

describe('StreetRouteBuilder.exploration', () => {
  it('loops through four waypoints with exploration cues', async () => {
    const directions = new FakeDirections();
    const route = await new StreetRouteBuilder(directions).exploration({ start: START, targetDistanceM: 3000 });

    expect(directions.calls).toHaveLength(4);
    expect(directions.calls[0]?.from).toEqual(START);
    expect(directions.calls[3]?.to).toEqual(START);
    expect(route?.name).toBe('Discovery Route');
    expect(route?.terrain).toBe('park');
    expect(route?.estimatedSteps).toBe(520);
    expect(cues(route)).toEqual([
      [0, 'Start exploring'],
      [3, 'Exploring new area'],
      [6, 'Exploring new area'],
      [9, 'Exploring new area'],
      [11, 'Back to start!'],
    ]);
  });
});

describe('StreetRouteBuilder.exploration with a missing return leg', () => {
  it('does not claim to be back at the start', async () => {
    const directions = new FakeDirections((from, to, call) => (call === 3 ? noRoute(from, to, call) : straightLeg(from, to, call)));
    const route = await new StreetRouteBuilder(directions).exploration({ start: START, targetDistanceM: 3000 });

    expect(cues(route)).toEqual([
      [0, 'Start exploring'],
      [3, 'Exploring new area'],
      [6, 'Exploring new area'],
    ]);
  });
});

describe('StreetRouteBuilder.build', () => {
  it('returns the four variants in order with their tags', async () => {
    const routes = await new StreetRouteBuilder(new FakeDirections()).build(START, 2000);

    expect(routes.map((r) => r && [r.name, r.shape, r.difficulty, r.terrain, r.strategy])).toEqual([
      ['Neighborhood Loop', 'loop_clockwise', 'easy', 'urban', 'street'],
      ['Counter Loop', 'loop_counterclockwise', 'easy', 'urban', 'street'],
      ['Out & Back', 'out_and_back', 'moderate', 'mixed', 'street'],
      ['Discovery Route', 'exploration', 'moderate', 'park', 'street'],
    ]);
  });

  it('reports steps as floor(distance × 1.3) for every variant', async () => {
    const directions = new FakeDirections((from, to) => ({
      ok: true,
      path: { points: [from, to], distanceM: 123.45, travelTimeSec: 88 },
    }));
    for (const route of await new StreetRouteBuilder(directions).build(START, 2000)) {
      if (!route) throw new Error('missing route');
      expect(route.estimatedSteps).toBe(Math.floor(route.estimatedDistanceM * 1.3));
    }
  });

  it('yields nulls, not errors, when the directions service is down', async () => {
    const routes = await new StreetRouteBuilder(new FakeDirections(noRoute)).build(START, 2000);
    expect(routes).toEqual([null, null, null, null]);
  });
});
