import type { Contracts } from 'applicationinsights'

/**
 * Telemetry client interface for dependency injection.
 * The subset of the Application Insights TelemetryClient this app uses;
 * `appInsights.defaultClient` satisfies it structurally.
 */
export interface ITelemetryClient {
    trackEvent(telemetry: Contracts.EventTelemetry): void

    trackException(telemetry: Contracts.ExceptionTelemetry): void

    trackMetric(telemetry: Contracts.MetricTelemetry): void

    /** Track an outbound call (Cosmos, Translator, Content Safety) */
    trackDependency(telemetry: Contracts.DependencyTelemetry): void

    /**
     * Flush buffered telemetry
     */
    flush(options?: { callback?: (response: string) => void; isAppCrashing?: boolean }): void
}
