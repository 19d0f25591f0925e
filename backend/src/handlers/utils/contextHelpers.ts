/**
 * Context helper utilities for Azure Functions handlers.
 * Simplifies dependency injection container access.
 */
import type { HttpRequest, HttpResponseInit, InvocationContext } from '@azure/functions'
import { Container, type interfaces } from 'inversify'
import type { BaseHandler } from '../base/BaseHandler.js'

/**
 * Get the inversify container placed on the invocation context by the preInvocation hook.
 */
export function getContainer(context: InvocationContext): Container {
    const container = context.extraInputs.get('container')
    if (!(container instanceof Container)) {
        throw new Error('Inversify container missing from invocation context')
    }
    return container
}

/**
 * Resolve a transient handler from the container and run it.
 */
export async function runHandler(
    handlerClass: interfaces.Newable<BaseHandler>,
    request: HttpRequest,
    context: InvocationContext
): Promise<HttpResponseInit> {
    const handler = getContainer(context).get(handlerClass)
    return handler.handle(request, context)
}
