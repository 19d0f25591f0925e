// reflect-metadata MUST be imported first for InversifyJS decorator metadata to work
import 'reflect-metadata'
import { app, type PreInvocationContext } from '@azure/functions'
// Import order matters: initialize App Insights before any user code for auto-collection.
import appInsights from 'applicationinsights'
import { Container } from 'inversify'
import { TOKENS } from './di/tokens.js'
import { setupContainer } from './inversify.config.js'
import { resolvePersistenceMode } from './persistenceConfig.js'
import type { ITelemetryClient } from './telemetry/ITelemetryClient.js'
import { isProbeRequest, resolveSamplingPercentage } from './telemetry/sampling.js'

const container = new Container()

function initializeApplicationInsights(): void {
    appInsights.setup().start()

    const sampling = resolveSamplingPercentage(process.env.APPINSIGHTS_SAMPLING_PERCENTAGE, process.env.NODE_ENV)
    const client = appInsights.defaultClient
    client.config.samplingPercentage = sampling.percentage
    if (sampling.adjusted) {
        client.trackEvent({
            name: 'Telemetry.Sampling.ConfigAdjusted',
            properties: {
                requestedValue: process.env.APPINSIGHTS_SAMPLING_PERCENTAGE,
                appliedPercentage: sampling.percentage,
                reason: sampling.reason,
                defaultSampling: sampling.defaultSampling
            }
        })
    }

    client.addTelemetryProcessor((envelope) => !isProbeRequest(envelope))
}

// The hook is awaited by the host, so bindings exist before the first invocation.
app.hook.appStart(async () => {
    // Application Insights only in cosmos mode (production/staging); memory mode stays offline
    const isCosmosMode = resolvePersistenceMode() === 'cosmos'
    if (isCosmosMode) {
        initializeApplicationInsights()
    } else {
        console.log('[startup] Memory mode detected - skipping Application Insights initialization')
    }

    const startTime = Date.now()
    try {
        await setupContainer(container)
    } catch (error) {
        // Log and emit so cold start failures are diagnosable, then fail startup
        console.error('Container setup failed', error)
        if (isCosmosMode) {
            appInsights.defaultClient.trackException({ exception: error instanceof Error ? error : new Error(String(error)) })
        }
        throw error
    }

    const duration = Date.now() - startTime
    if (isCosmosMode) {
        appInsights.defaultClient.trackMetric({ name: 'ContainerSetupDuration', value: duration })
    } else {
        console.log(`[startup] Container setup completed in ${duration}ms`)
    }

    // Azure Functions may recycle processes; flush buffered telemetry on the way out.
    const flushTelemetry = (isAppCrashing: boolean) => {
        container.get<ITelemetryClient>(TOKENS.TelemetryClient).flush({ isAppCrashing })
    }
    for (const sig of ['SIGINT', 'SIGTERM'] as const) {
        process.once(sig, () => flushTelemetry(true))
    }
    process.once('beforeExit', () => flushTelemetry(false))
})

app.hook.preInvocation((context: PreInvocationContext) => {
    context.invocationContext.extraInputs.set('container', container)
})
