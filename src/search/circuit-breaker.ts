/**
 * Per-provider circuit breaker
 *
 * A provider that fails `failureThreshold` times in a row, with all of those
 * failures inside `windowMs`, is skipped until `cooldownMs` has passed. The
 * first call after the cooldown is a trial: success closes the circuit,
 * failure re-opens it.
 */

export interface CircuitBreakerOptions {
  failureThreshold: number;
  windowMs: number;
  cooldownMs: number;
  /** Injected for tests */
  now?: () => number;
}

interface ProviderCircuit {
  /** Timestamps of the current run of consecutive failures */
  failures: number[];
  openedAt: number | null;
}

export type CircuitState = 'closed' | 'open' | 'half-open';

export class CircuitBreaker {
  private circuits = new Map<string, ProviderCircuit>();
  private readonly now: () => number;

  constructor(private readonly options: CircuitBreakerOptions) {
    this.now = options.now ?? Date.now;
  }

  private circuit(provider: string): ProviderCircuit {
    let circuit = this.circuits.get(provider);
    if (!circuit) {
      circuit = { failures: [], openedAt: null };
      this.circuits.set(provider, circuit);
    }
    return circuit;
  }

  state(provider: string): CircuitState {
    const circuit = this.circuits.get(provider);
    if (!circuit || circuit.openedAt === null) {
      return 'closed';
    }
    return this.now() - circuit.openedAt >= this.options.cooldownMs ? 'half-open' : 'open';
  }

  /** False while the circuit is open */
  canAttempt(provider: string): boolean {
    return this.state(provider) !== 'open';
  }

  recordSuccess(provider: string): void {
    this.circuits.delete(provider);
  }

  recordFailure(provider: string): void {
    const circuit = this.circuit(provider);
    const now = this.now();

    if (circuit.openedAt !== null) {
      // Failed trial call: start a fresh cooldown
      circuit.openedAt = now;
      return;
    }

    circuit.failures = circuit.failures.filter((at) => now - at <= this.options.windowMs);
    circuit.failures.push(now);
    if (circuit.failures.length >= this.options.failureThreshold) {
      circuit.openedAt = now;
      circuit.failures = [];
    }
  }
}
