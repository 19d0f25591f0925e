import type { Contracts } from 'applicationinsights'
import { injectable } from 'inversify'
import type { ITelemetryClient } from '../../src/telemetry/ITelemetryClient.js'

/**
 * Mock implementation of ITelemetryClient for unit tests.
 * Stores tracked telemetry for verification in tests.
 */
@injectable()
export class MockTelemetryClient implements ITelemetryClient {
    public events: Contracts.EventTelemetry[] = []
    public exceptions: Contracts.ExceptionTelemetry[] = []
    public metrics: Contracts.MetricTelemetry[] = []
    public dependencies: Contracts.DependencyTelemetry[] = []
    public flushCount = 0

    trackEvent(telemetry: Contracts.EventTelemetry): void {
        this.events.push(telemetry)
    }

    trackException(telemetry: Contracts.ExceptionTelemetry): void {
        this.exceptions.push(telemetry)
    }

    trackMetric(telemetry: Contracts.MetricTelemetry): void {
        this.metrics.push(telemetry)
    }

    trackDependency(telemetry: Contracts.DependencyTelemetry): void {
        this.dependencies.push(telemetry)
    }

    flush(): void {
        this.flushCount++
    }

    // Test helpers
    clear(): void {
        this.events = []
        this.exceptions = []
        this.metrics = []
        this.dependencies = []
    }

    eventNames(): string[] {
        return this.events.map((e) => e.name)
    }

    /** Properties of the first event with this name */
    findEvent(name: string): Record<string, unknown> | undefined {
        return this.events.find((e) => e.name === name)?.properties
    }
}
