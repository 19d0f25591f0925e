import type { Contracts } from 'applicationinsights'
import { injectable } from 'inversify'
import type { ITelemetryClient } from './ITelemetryClient.js'

/**
 * Null implementation of ITelemetryClient for memory mode and tests.
 * Every operation is a no-op so nothing initializes the SDK or opens a connection.
 */
@injectable()
export class NullTelemetryClient implements ITelemetryClient {
    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    trackEvent(telemetry: Contracts.EventTelemetry): void {}

    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    trackException(telemetry: Contracts.ExceptionTelemetry): void {}

    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    trackMetric(telemetry: Contracts.MetricTelemetry): void {}

    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    trackDependency(telemetry: Contracts.DependencyTelemetry): void {}

    flush(options?: { callback?: (response: string) => void; isAppCrashing?: boolean }): void {
        options?.callback?.('')
    }
}
