/**
 * Circuit Breaker for outbound dependencies
 *
 * States:
 * - CLOSED: Normal operation, calls pass through
 * - OPEN: Failures exceeded threshold, calls fail fast without touching the dependency
 * - HALF_OPEN: Probe calls decide whether the dependency recovered
 */
import { logger } from '../observability/logger.js';
import { circuitState, circuitTrips } from '../observability/metrics.js';

export enum CircuitState {
    CLOSED = 0,
    OPEN = 1,
    HALF_OPEN = 2,
}

export interface CircuitBreakerConfig {
    name: string;
    failureThreshold: number;      // Consecutive failures before opening
    resetTimeout: number;          // ms an open circuit waits before probing
    halfOpenRequests: number;      // Probes allowed in flight while half-open
}

const DEFAULT_CONFIG: Omit<CircuitBreakerConfig, 'name'> = {
    failureThreshold: 5,
    resetTimeout: 30000,
    halfOpenRequests: 1,
};

export class CircuitBreaker {
    private state: CircuitState = CircuitState.CLOSED;
    private consecutiveFailures = 0;
    private openedAt = 0;
    private probesInFlight = 0;
    private readonly config: CircuitBreakerConfig;

    constructor(config: Partial<CircuitBreakerConfig> & { name: string }) {
        this.config = { ...DEFAULT_CONFIG, ...config };
        this.updateMetrics();
    }

    /**
     * Run `fn` unless the circuit is open or every half-open probe slot is taken.
     * The first successful probe closes the circuit; a failed one reopens it.
     */
    async execute<T>(fn: () => Promise<T>): Promise<T> {
        const state = this.getState();
        if (state === CircuitState.OPEN) {
            throw new CircuitOpenError(this.config.name);
        }

        const probing = state === CircuitState.HALF_OPEN;
        if (probing) {
            if (this.probesInFlight >= this.config.halfOpenRequests) {
                throw new CircuitOpenError(this.config.name);
            }
            this.probesInFlight++;
        }

        try {
            const result = await fn();
            this.recordSuccess();
            return result;
        } catch (error) {
            this.recordFailure();
            throw error;
        } finally {
            if (probing && this.probesInFlight > 0) {
                this.probesInFlight--;
            }
        }
    }

    private recordSuccess(): void {
        this.consecutiveFailures = 0;
        if (this.state === CircuitState.HALF_OPEN) {
            this.transitionTo(CircuitState.CLOSED);
        }
    }

    private recordFailure(): void {
        this.consecutiveFailures++;

        const shouldOpen = this.state === CircuitState.HALF_OPEN
            || (this.state === CircuitState.CLOSED && this.consecutiveFailures >= this.config.failureThreshold);
        if (shouldOpen) {
            this.transitionTo(CircuitState.OPEN);
        }
    }

    private transitionTo(newState: CircuitState): void {
        const oldState = this.state;
        this.state = newState;

        switch (newState) {
            case CircuitState.OPEN:
                this.openedAt = Date.now();
                circuitTrips.labels(this.config.name).inc();
                break;
            case CircuitState.HALF_OPEN:
                this.probesInFlight = 0;
                break;
            case CircuitState.CLOSED:
                this.consecutiveFailures = 0;
                this.probesInFlight = 0;
                break;
        }

        logger.info(`Circuit breaker ${this.config.name} transitioned`, {
            from: CircuitState[oldState],
            to: CircuitState[newState],
        });

        this.updateMetrics();
    }

    private updateMetrics(): void {
        circuitState.labels(this.config.name).set(this.state);
    }

    /**
     * Current state; an open circuit past its reset timeout becomes half-open here
     */
    getState(): CircuitState {
        if (this.state === CircuitState.OPEN && Date.now() - this.openedAt >= this.config.resetTimeout) {
            this.transitionTo(CircuitState.HALF_OPEN);
        }
        return this.state;
    }

    reset(): void {
        this.transitionTo(CircuitState.CLOSED);
    }
}

/**
 * Error thrown when circuit is open
 */
export class CircuitOpenError extends Error {
    constructor(circuitName: string) {
        super(`Circuit breaker '${circuitName}' is open`);
        this.name = 'CircuitOpenError';
    }
}
