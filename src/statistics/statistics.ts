export interface ActiveFlight {
  callsign: string;
  departure: string;
  arrival: string;
  route: string;
  seats: number;
  aircraft: string;
}

export interface ActiveController {
  callsign: string;
  frequency: number | null;
  status: string | null;
}

export interface AirportRanking {
  airport: string;
  departures: number;
  arrivals: number;
}

export interface LeaderboardEntry {
  rank: number;
  subject: string;
  minutes: number;
}

export interface StatisticsInit {
  totalFlights: number;
  domesticFlights: number;
  outgoingFlights: number;
  incomingFlights: number;
  uniquePilots: number;
  peopleOnBoard: number;
  flightMinutes: number;
  controlMinutes: number;
  controllerCount: number;
  activeFlights?: ActiveFlight[];
  activeControllers?: ActiveController[];
  weather?: string;
  topAirports?: AirportRanking[];
  topPilots?: LeaderboardEntry[];
  topControllers?: LeaderboardEntry[];
}

/**
 * Result of a live or windowed query. Built once per query and frozen; the
 * region prefixes used to build it are not part of the value.
 */
export class Statistics {
  readonly totalFlights: number;
  readonly domesticFlights: number;
  readonly outgoingFlights: number;
  readonly incomingFlights: number;
  readonly uniquePilots: number;
  readonly peopleOnBoard: number;
  readonly flightMinutes: number;
  readonly controlMinutes: number;
  readonly controllerCount: number;
  readonly activeFlights?: readonly ActiveFlight[];
  readonly activeControllers?: readonly ActiveController[];
  readonly weather?: string;
  readonly topAirports?: readonly AirportRanking[];
  readonly topPilots?: readonly LeaderboardEntry[];
  readonly topControllers?: readonly LeaderboardEntry[];

  constructor(init: StatisticsInit) {
    this.totalFlights = init.totalFlights;
    this.domesticFlights = init.domesticFlights;
    this.outgoingFlights = init.outgoingFlights;
    this.incomingFlights = init.incomingFlights;
    this.uniquePilots = init.uniquePilots;
    this.peopleOnBoard = init.peopleOnBoard;
    this.flightMinutes = init.flightMinutes;
    this.controlMinutes = init.controlMinutes;
    this.controllerCount = init.controllerCount;
    if (init.activeFlights) this.activeFlights = freezeAll(init.activeFlights);
    if (init.activeControllers) this.activeControllers = freezeAll(init.activeControllers);
    if (init.weather !== undefined) this.weather = init.weather;
    if (init.topAirports) this.topAirports = freezeAll(init.topAirports);
    if (init.topPilots) this.topPilots = freezeAll(init.topPilots);
    if (init.topControllers) this.topControllers = freezeAll(init.topControllers);
    Object.freeze(this);
  }

  /** Copy with the given fields replaced. */
  with(changes: Partial<StatisticsInit>): Statistics {
    return new Statistics({ ...this.toInit(), ...changes });
  }

  private toInit(): StatisticsInit {
    return {
      totalFlights: this.totalFlights,
      domesticFlights: this.domesticFlights,
      outgoingFlights: this.outgoingFlights,
      incomingFlights: this.incomingFlights,
      uniquePilots: this.uniquePilots,
      peopleOnBoard: this.peopleOnBoard,
      flightMinutes: this.flightMinutes,
      controlMinutes: this.controlMinutes,
      controllerCount: this.controllerCount,
      activeFlights: this.activeFlights?.slice(),
      activeControllers: this.activeControllers?.slice(),
      weather: this.weather,
      topAirports: this.topAirports?.slice(),
      topPilots: this.topPilots?.slice(),
      topControllers: this.topControllers?.slice(),
    };
  }
}

function freezeAll<T extends object>(items: T[]): readonly T[] {
  return Object.freeze(items.map((item) => Object.freeze({ ...item })));
}
