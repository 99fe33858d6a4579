import { Hono } from 'hono'
import info from '../package.json' with { type: 'json' }
import { checkDatabaseHealth } from './database/health.ts'
import recon from './records/routes.ts'

const { name, version } = info

const app = new Hono()

app.get('/', (c) =>
  c.json({
    message: 'POST /recon with { "url": "..." } to extract contacts',
  }),
)

app.get('/about', (c) =>
  c.json({
    name,
    version,
  }),
)

app.get('/health', async (c) => {
  const database = await checkDatabaseHealth()
  return c.json(
    { status: database.isHealthy ? 'ok' : 'degraded', database },
    database.isHealthy ? 200 : 503,
  )
})

app.route('/recon', recon)

export default app
