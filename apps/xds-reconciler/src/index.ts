import { loadDefaultConfig } from '@switchyard/config'
import { switchyardHonoServer } from '@switchyard/service'
import { ReconcilerService } from './service.js'

const config = loadDefaultConfig()
const reconciler = await ReconcilerService.create({ config })

await switchyardHonoServer(reconciler.handler, {
  services: [reconciler],
  port: config.port,
}).start()
