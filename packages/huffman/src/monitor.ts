import type {
  CounterType,
  ICodecMonitor,
  ICodecMonitorConfig,
  ICodecStats,
  StatsMode,
} from "./monitor.domain";

const BASIC_COUNTERS: ReadonlySet<CounterType> = new Set<CounterType>([
  "symbolsIn",
  "bitsOut",
  "bytesOut",
  "bytesIn",
  "symbolsOut",
  "tablesBuilt",
]);

function emptyCounters(): Record<CounterType, number> {
  return {
    symbolsIn: 0,
    bitsOut: 0,
    bytesOut: 0,
    bytesIn: 0,
    symbolsOut: 0,
    tablesBuilt: 0,
    paddingBits: 0,
    alphabetSizeSum: 0,
    codeLengthSum: 0,
  };
}

/**
 * Counts codec activity. "performance-only" tracks the basic flow counters,
 * "extended" adds padding and table shape counters.
 */
export class CodecMonitor implements ICodecMonitor {
  readonly mode: StatsMode;
  private _counters = emptyCounters();
  private _timeStart: number | null = null;

  constructor({ mode = "performance-only" }: ICodecMonitorConfig = {}) {
    this.mode = mode;
  }

  start(): void {
    if (this._timeStart !== null) return;
    this._timeStart = performance.now();
  }

  increment(counter: CounterType, amount = 1): void {
    if (this.mode === "disabled") return;
    if (this.mode !== "extended" && !BASIC_COUNTERS.has(counter)) return;
    this._counters[counter] += amount;
  }

  getCounters(): Record<CounterType, number> {
    return { ...this._counters };
  }

  reset(): void {
    this._counters = emptyCounters();
    this._timeStart = null;
  }

  get stats(): ICodecStats | null {
    if (this._timeStart === null) return null;
    const counters = this._counters;

    return {
      durationMS: performance.now() - this._timeStart,

      symbolsIn: counters.symbolsIn,
      bytesOut: counters.bytesOut,
      bytesIn: counters.bytesIn,
      symbolsOut: counters.symbolsOut,
      tablesBuilt: counters.tablesBuilt,

      compressionRatio: counters.symbolsIn
        ? counters.bytesOut / counters.symbolsIn
        : 0,
      bitsPerSymbol: counters.symbolsIn
        ? counters.bitsOut / counters.symbolsIn
        : 0,

      paddingBits: counters.paddingBits,
      avgAlphabetSize: counters.tablesBuilt
        ? counters.alphabetSizeSum / counters.tablesBuilt
        : 0,
      avgCodeLength: counters.alphabetSizeSum
        ? counters.codeLengthSum / counters.alphabetSizeSum
        : 0,
    };
  }
}

export class NoOpCodecMonitor implements ICodecMonitor {
  readonly mode: StatsMode = "disabled";
  start(): void {}
  increment(): void {}
  getCounters(): Record<CounterType, number> {
    return emptyCounters();
  }
  reset(): void {}
  get stats(): ICodecStats | null {
    return null;
  }
}
