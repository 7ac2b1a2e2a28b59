import { Inject, Injectable, InjectionToken, OnDestroy, Optional } from '@angular/core';
import { BehaviorSubject, interval, Observable, Subscription } from 'rxjs';
import { Life } from '../model/life';
import type { Cell, EdgePolicy, LifePattern } from '../model/life';

export interface LifeRuntimeConfig {
  cols: number;
  rows: number;
  edgePolicy: EdgePolicy;
  /** Omit for a different random start on every build. */
  seed?: number | string;
  /** Ticks per generation; 1 steps on every tick. */
  renderEvery: number;
}

export const DEFAULT_LIFE_RUNTIME_CONFIG: Readonly<LifeRuntimeConfig> = {
  cols: 48,
  rows: 64,
  edgePolicy: 'toroidal',
  renderEvery: 5
};

export const LIFE_RUNTIME_CONFIG = new InjectionToken<Partial<LifeRuntimeConfig>>('LIFE_RUNTIME_CONFIG');

const DEFAULT_FRAME_MS = 1000 / 60;

/**
 * Owns one Life engine and advances it on a tick cadence. A renderer calls
 * `tick()` once per frame (or lets `start()` do it) and then reads cells
 * through `engine`.
 */
@Injectable({ providedIn: 'root' })
export class LifeRuntimeService implements OnDestroy {
  private readonly config: LifeRuntimeConfig;
  private life: Life;
  private initialPattern: LifePattern;
  private ticksSinceStep = 0;
  private intervalSubscription: Subscription | null = null;

  private generationSubject = new BehaviorSubject<number>(0);
  generation$ = this.generationSubject.asObservable();

  private renderEverySubject: BehaviorSubject<number>;
  renderEvery$: Observable<number>;

  private pausedSubject = new BehaviorSubject<boolean>(false);
  paused$ = this.pausedSubject.asObservable();

  private runningSubject = new BehaviorSubject<boolean>(false);
  running$ = this.runningSubject.asObservable();

  constructor(@Optional() @Inject(LIFE_RUNTIME_CONFIG) config: Partial<LifeRuntimeConfig> | null = null) {
    this.config = { ...DEFAULT_LIFE_RUNTIME_CONFIG, ...(config ?? {}) };
    this.renderEverySubject = new BehaviorSubject<number>(normalizeRenderEvery(this.config.renderEvery));
    this.renderEvery$ = this.renderEverySubject.asObservable();
    this.life = new Life(this.config.cols, this.config.rows, {
      edgePolicy: this.config.edgePolicy,
      seed: this.config.seed
    });
    this.initialPattern = this.life.snapshot();
  }

  ngOnDestroy(): void {
    this.stop();
  }

  get engine(): Life {
    return this.life;
  }

  get renderEvery() {
    return this.renderEverySubject.value;
  }

  get paused() {
    return this.pausedSubject.value;
  }

  /** Returns true when this tick produced a new generation. */
  tick(): boolean {
    if (this.pausedSubject.value) return false;
    this.ticksSinceStep++;
    if (this.ticksSinceStep < this.renderEverySubject.value) return false;
    this.ticksSinceStep = 0;
    this.life.step();
    this.generationSubject.next(this.life.generation);
    return true;
  }

  faster() {
    this.setRenderEvery(this.renderEverySubject.value - 1);
    return this.renderEverySubject.value;
  }

  slower() {
    this.setRenderEvery(this.renderEverySubject.value + 1);
    return this.renderEverySubject.value;
  }

  setRenderEvery(value: number) {
    this.renderEverySubject.next(normalizeRenderEvery(value));
  }

  togglePause() {
    this.pausedSubject.next(!this.pausedSubject.value);
    return this.pausedSubject.value;
  }

  /** Restarts from the state this runtime was last seeded with. */
  replay() {
    console.info('[LifeRuntime] Replaying from the initial state.', {
      fromGeneration: this.life.generation
    });
    this.replaceEngine(Life.fromPattern(this.initialPattern, { edgePolicy: this.config.edgePolicy }));
  }

  /** Starts over from a fresh random fill. */
  reseed(seed?: number | string) {
    this.replaceEngine(new Life(this.config.cols, this.config.rows, {
      edgePolicy: this.config.edgePolicy,
      seed
    }));
    this.initialPattern = this.life.snapshot();
  }

  /** Replaces the grid with the given live cells; the current engine survives a rejected load. */
  load(cells: Cell[]) {
    let next: Life;
    try {
      next = new Life(this.config.cols, this.config.rows, { edgePolicy: this.config.edgePolicy, cells });
    } catch (error) {
      console.error('[LifeRuntime] Rejected pattern load.', { cellCount: cells.length, error });
      throw error;
    }
    this.replaceEngine(next);
    this.initialPattern = this.life.snapshot();
  }

  start(frameMs = DEFAULT_FRAME_MS) {
    if (!Number.isFinite(frameMs) || frameMs <= 0) {
      throw new RangeError(`Frame interval must be a positive number of milliseconds, got ${frameMs}.`);
    }
    this.stop();
    this.intervalSubscription = interval(frameMs).subscribe(() => this.tick());
    this.runningSubject.next(true);
  }

  stop() {
    this.intervalSubscription?.unsubscribe();
    this.intervalSubscription = null;
    if (this.runningSubject.value) {
      this.runningSubject.next(false);
    }
  }

  private replaceEngine(next: Life) {
    this.life = next;
    this.ticksSinceStep = 0;
    this.generationSubject.next(next.generation);
  }
}

function normalizeRenderEvery(value: number) {
  return Math.max(1, Math.floor(Number.isFinite(value) ? value : 1));
}
