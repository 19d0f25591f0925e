/**
 * Central Azure Functions registration entrypoint.
 *
 * The Node v4 programming model executes ONLY the module named by package.json#main.
 * That module must import every file that calls `app.http(...)`. Keep imports explicit:
 * when adding a file under `./functions/`, add it here.
 */

// Hooks (container setup, App Insights) first
import './index.js'

import './functions/playerLogin.js'
import './functions/playerRegister.js'
import './functions/playerUpdate.js'
import './functions/promptCreate.js'
import './functions/promptDelete.js'
import './functions/promptModerate.js'
import './functions/utilsGet.js'
import './functions/utilsWelcome.js'

// (Add new function imports above this line.)
