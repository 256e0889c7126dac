import { Vessel } from './Vessel.js';

export interface Scenario {
    name: string;
    ownship: Vessel;
    target: Vessel;
}

/**
 * Two-vessel encounters used by tests and the profiling script.  Positions
 * are in nautical miles and speeds in knots, so times come out in hours.
 */
export class Scenarios {
    /** Reciprocal courses along the x axis, meeting at the midpoint. */
    static headOn: Scenario = {
        name: 'headOn',
        ownship: new Vessel(50, 0, 0, 10, 90),
        target: new Vessel(50, 100, 0, 10, 270),
    };

    /** Northbound ownship, southbound target passing 20 NM to starboard. */
    static crossing: Scenario = {
        name: 'crossing',
        ownship: new Vessel(50, 0, 0, 10, 0),
        target: new Vessel(80, 20, 100, 10, 180),
    };

    /** Faster ownship coming up astern of a slower vessel. */
    static overtake: Scenario = {
        name: 'overtake',
        ownship: new Vessel(50, 0, 0, 15, 0),
        target: new Vessel(30, 1, 10, 5, 0),
    };

    /** Moving ownship passing a vessel at anchor. */
    static stationaryTarget: Scenario = {
        name: 'stationaryTarget',
        ownship: new Vessel(50, 0, 0, 12, 90),
        target: new Vessel(200, 30, 2, 0, 0),
    };

    /** Same course and speed; CPA time is undefined. */
    static parallel: Scenario = {
        name: 'parallel',
        ownship: new Vessel(50, 0, 0, 10, 45),
        target: new Vessel(50, 3, 0, 10, 45),
    };

    /** Returns all available scenarios. */
    static all(): Scenario[] {
        return [
            Scenarios.headOn,
            Scenarios.crossing,
            Scenarios.overtake,
            Scenarios.stationaryTarget,
            Scenarios.parallel,
        ];
    }
}
