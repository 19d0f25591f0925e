import { app } from '@azure/functions'
import { playerRegister } from '../handlers/playerRegister.js'

app.http('PlayerRegister', {
    route: 'player/register',
    methods: ['POST'],
    authLevel: 'anonymous',
    handler: playerRegister
})
