/**
 * Process-exit key wiping.
 *
 * Unlocked sessions register a synchronous wipe callback here. The callbacks
 * run on normal exit, on SIGINT/SIGTERM/SIGHUP and when an uncaught exception
 * is about to terminate the process. Handlers are installed on first
 * registration and removed again once no session is registered.
 */

type Wiper = () => void;

const SIGNAL_NUMBERS = new Map<NodeJS.Signals, number>([
  ["SIGHUP", 1],
  ["SIGINT", 2],
  ["SIGTERM", 15],
]);
const SIGNALS = Array.from(SIGNAL_NUMBERS.keys());

const wipers = new Set<Wiper>();
let installed = false;

function onExit(): void {
  wipeAllSessions();
}

function onUncaught(): void {
  wipeAllSessions();
}

/** Exits only when no other listener is left to handle the signal. */
function onSignal(signal: NodeJS.Signals): void {
  wipeAllSessions();
  if (process.listenerCount(signal) > 1) {
    return;
  }
  process.exit(128 + (SIGNAL_NUMBERS.get(signal) ?? 0));
}

function install(): void {
  if (installed) {
    return;
  }
  process.on("exit", onExit);
  process.on("uncaughtExceptionMonitor", onUncaught);
  for (const signal of SIGNALS) {
    process.on(signal, onSignal);
  }
  installed = true;
}

function uninstall(): void {
  if (!installed) {
    return;
  }
  process.off("exit", onExit);
  process.off("uncaughtExceptionMonitor", onUncaught);
  for (const signal of SIGNALS) {
    process.off(signal, onSignal);
  }
  installed = false;
}

/** Register a wipe callback; handlers are installed on first use. */
export function registerWiper(wiper: Wiper): void {
  wipers.add(wiper);
  install();
}

export function unregisterWiper(wiper: Wiper): void {
  wipers.delete(wiper);
  if (wipers.size === 0) {
    uninstall();
  }
}

/**
 * Run every registered callback. A failing callback is reported and does
 * not stop the others.
 */
export function wipeAllSessions(): void {
  for (const wiper of wipers) {
    try {
      wiper();
    } catch (error) {
      console.warn(
        `[vaultkeep] Failed to wipe session key: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}

/** Number of registered callbacks and whether process handlers are attached. */
export function lifecycleState(): { readonly sessions: number; readonly installed: boolean } {
  return { sessions: wipers.size, installed };
}
