import { loadEnvFiles } from '../services/config'
import { runMarketSnapshot } from './cli'

loadEnvFiles()

runMarketSnapshot(process.argv.slice(2))
  .then(code => { process.exitCode = code })
  .catch(e => { console.error('[CLI] unexpected error', e); process.exitCode = 1 })
