import { app } from '@azure/functions'
import { utilsGet } from '../handlers/utilsGet.js'

app.http('UtilsGet', {
    route: 'utils/get',
    methods: ['GET', 'POST'],
    authLevel: 'anonymous',
    handler: utilsGet
})
