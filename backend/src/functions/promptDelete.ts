import { app } from '@azure/functions'
import { promptDelete } from '../handlers/promptDelete.js'

app.http('PromptDelete', {
    route: 'prompt/delete',
    methods: ['POST'],
    authLevel: 'anonymous',
    handler: promptDelete
})
