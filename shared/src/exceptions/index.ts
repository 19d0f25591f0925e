/**
 * Domain exceptions for repository operations.
 */

export {
    CosmosException,
    ConcurrencyException,
    cosmosStatusCode,
    isCosmosErrorLike,
    NotFoundException,
    PreconditionFailedException,
    RetryableException,
    translateCosmosError,
    UnexpectedCosmosException,
    ValidationException,
    type CosmosErrorLike
} from './cosmosExceptions.js'
