export { ChromePress, toContentSource, DEFAULT_WAIT_TIMEOUT_MS } from './browser.js';
export type { ChromePressDeps, LaunchedChrome, SessionHandle, SupervisorHandle } from './browser.js';
export { ChromeSupervisor, SupervisedChrome, buildChromeArgs, parseDevToolsEndpoint } from './chrome-launcher.js';
export type { LocateChrome, SpawnChrome, SupervisorDeps } from './chrome-launcher.js';
export { findChromeExecutable, isValidChromeExecutable, validateChromeVersion } from './chrome-locator.js';
export { resolveLaunchConfig, isDocker } from './config.js';
export type { LaunchConfig } from './config.js';
export { ControlSession, injectBaseHref, DEFAULT_NAVIGATION_TIMEOUT_MS } from './connection.js';
export type { ControlSessionOptions, NavigateOptions } from './connection.js';
export {
  ProcessRegistry,
  RegistryEntry,
  processRegistry,
  installSignalHandlers,
  isHostTerminating,
} from './process-registry.js';
export {
  awaitReady,
  parseWaitSpec,
  describeWait,
  fixedDelay,
  networkIdle,
  elementPresent,
  elementVisible,
  customPredicate,
  isTruthy,
  DEFAULT_FIXED_DELAY_MS,
  DEFAULT_QUIET_PERIOD_MS,
  DEFAULT_MAX_INFLIGHT,
  DEFAULT_POLL_INTERVAL_MS,
} from './wait/index.js';
export * from './errors.js';
export { LogLevel, Logger, createLogger, setGlobalLogLevel, getGlobalLogLevel, setLogColors, setLogTimestamps } from './logging.js';

// Types
export type {
  ChromeKind,
  ChromeExecutable,
  LaunchOptions,
  ContentSource,
  EvaluateOptions,
  EvaluationResult,
  NetworkActivity,
  PageChannel,
  PrintOptions,
  ProtocolDomain,
  FixedDelayWait,
  NetworkIdleWait,
  ElementWait,
  CustomPredicateWait,
  WaitSpec,
  AwaitOptions,
  GenerateOptions,
} from './types.js';
