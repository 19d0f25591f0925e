import { app } from '@azure/functions'
import { promptModerate } from '../handlers/promptModerate.js'

app.http('PromptModerate', {
    route: 'prompt/moderate',
    methods: ['POST'],
    authLevel: 'anonymous',
    handler: promptModerate
})
