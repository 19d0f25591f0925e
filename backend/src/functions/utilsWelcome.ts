import { app } from '@azure/functions'
import { utilsWelcome } from '../handlers/utilsWelcome.js'

app.http('UtilsWelcome', {
    route: 'utils/welcome',
    methods: ['GET'],
    authLevel: 'anonymous',
    handler: utilsWelcome
})
