import { app } from '@azure/functions'
import { playerLogin } from '../handlers/playerLogin.js'

app.http('PlayerLogin', {
    route: 'player/login',
    methods: ['GET', 'POST'],
    authLevel: 'anonymous',
    handler: playerLogin
})
