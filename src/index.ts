export { type Clock, sequenceClock, systemClock } from "./clock.js";
export { TemplateFormatError, formatTemplate } from "./format.js";
export {
  NANOS_PER_MICRO,
  NANOS_PER_MILLI,
  NANOS_PER_SECOND,
  fromMillis,
  pretty,
} from "./pretty.js";
export {
  Timer,
  timer,
  time,
  timePretty,
  timePrettyFormat,
  timeFuture,
  timeFuturePretty,
  timeFuturePrettyFormat,
} from "./timer.js";
export type { NanosReporter, PrettyReporter, TimerOptions } from "./timer.js";
export { log, logReporter } from "./utils/logger.js";
export type { LogChannel } from "./utils/logger.js";
