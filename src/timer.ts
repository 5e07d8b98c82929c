import { type Clock, systemClock } from "./clock.js";
import { formatTemplate } from "./format.js";
import { pretty } from "./pretty.js";
import { errorMessage, log } from "./utils/logger.js";

/** Receives the raw elapsed nanoseconds of one timed operation. */
export type NanosReporter = (nanos: bigint) => void;

/** Receives the elapsed time already rendered by {@link pretty}. */
export type PrettyReporter = (pretty: string) => void;

export interface TimerOptions {
  /** Defaults to {@link systemClock}. */
  clock?: Clock;
  /**
   * Called when a reporter throws while observing a promise. There is no
   * caller left to rethrow to, so the default logs it.
   */
  onReporterError?: (err: unknown) => void;
}

function logReporterError(err: unknown): void {
  log.error(`Timing reporter failed: ${errorMessage(err)}`);
}

/**
 * Times blocks of code and promise completions, passing the elapsed time to a
 * caller-supplied reporter.
 *
 * The synchronous calls report only when the body returns; a throwing body
 * propagates without a report. The promise calls report on settlement either
 * way.
 *
 * @example
 * timer.timePrettyFormat("Index rebuilt in %s", log.dim, () => rebuild());
 */
export class Timer {
  private readonly clock: Clock;
  private readonly onReporterError: (err: unknown) => void;

  constructor(options: TimerOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.onReporterError = options.onReporterError ?? logReporterError;
  }

  /** Time `body` and pass the elapsed nanoseconds to `report`. */
  time<T>(report: NanosReporter, body: () => T): T {
    const start = this.clock.now();
    const result = body();
    report(this.clock.now() - start);
    return result;
  }

  /** Like {@link time}, with the elapsed time rendered as e.g. "372 ns". */
  timePretty<T>(report: PrettyReporter, body: () => T): T {
    return this.time((nanos) => report(pretty(nanos)), body);
  }

  /**
   * Like {@link timePretty}, with the rendered time substituted into
   * `template` at its `%s`.
   *
   * @example
   * timer.timePrettyFormat("This operation took %s", log.dim, () => work());
   * // [elapsed] This operation took 1.204 s
   */
  timePrettyFormat<T>(
    template: string,
    report: PrettyReporter,
    body: () => T,
  ): T {
    return this.timePretty((p) => report(formatTemplate(template, p)), body);
  }

  /**
   * Time the promise returned by `producer`, from before it is called until
   * it settles. `report` runs once on fulfilment or rejection; the returned
   * promise settles exactly as the produced one does.
   */
  timeFuture<T>(report: NanosReporter, producer: () => Promise<T>): Promise<T> {
    const start = this.clock.now();
    const future = producer();

    const observe = () => {
      try {
        report(this.clock.now() - start);
      } catch (err) {
        this.reporterFailed(err);
      }
    };
    // The derived promise always fulfils, so a rejection of `future` stays
    // with the caller's own handlers.
    void future.then(observe, observe);

    return future;
  }

  private reporterFailed(err: unknown): void {
    try {
      this.onReporterError(err);
    } catch (handlerErr) {
      // Nothing awaits the observer; a throw here would be an unhandled rejection
      logReporterError(handlerErr);
    }
  }

  /** Like {@link timeFuture}, with the elapsed time rendered by {@link pretty}. */
  timeFuturePretty<T>(
    report: PrettyReporter,
    producer: () => Promise<T>,
  ): Promise<T> {
    return this.timeFuture((nanos) => report(pretty(nanos)), producer);
  }

  /**
   * Like {@link timeFuturePretty}, with the rendered time substituted into
   * `template`. A malformed template goes to `onReporterError`.
   */
  timeFuturePrettyFormat<T>(
    template: string,
    report: PrettyReporter,
    producer: () => Promise<T>,
  ): Promise<T> {
    return this.timeFuturePretty(
      (p) => report(formatTemplate(template, p)),
      producer,
    );
  }
}

/** Process-wide timer on the system clock. */
export const timer = new Timer();

export const time = <T>(report: NanosReporter, body: () => T): T =>
  timer.time(report, body);

export const timePretty = <T>(report: PrettyReporter, body: () => T): T =>
  timer.timePretty(report, body);

export const timePrettyFormat = <T>(
  template: string,
  report: PrettyReporter,
  body: () => T,
): T => timer.timePrettyFormat(template, report, body);

export const timeFuture = <T>(
  report: NanosReporter,
  producer: () => Promise<T>,
): Promise<T> => timer.timeFuture(report, producer);

export const timeFuturePretty = <T>(
  report: PrettyReporter,
  producer: () => Promise<T>,
): Promise<T> => timer.timeFuturePretty(report, producer);

export const timeFuturePrettyFormat = <T>(
  template: string,
  report: PrettyReporter,
  producer: () => Promise<T>,
): Promise<T> => timer.timeFuturePrettyFormat(template, report, producer);
