import { app } from '@azure/functions'
import { playerUpdate } from '../handlers/playerUpdate.js'

app.http('PlayerUpdate', {
    route: 'player/update',
    methods: ['PUT', 'POST'],
    authLevel: 'anonymous',
    handler: playerUpdate
})
