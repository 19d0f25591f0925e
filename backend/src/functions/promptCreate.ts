import { app } from '@azure/functions'
import { promptCreate } from '../handlers/promptCreate.js'

app.http('PromptCreate', {
    route: 'prompt/create',
    methods: ['POST'],
    authLevel: 'anonymous',
    handler: promptCreate
})
