import { Hono } from 'hono'
import { logger } from 'hono/logger'
import type { AppDeps } from './deps.js'
import { isNotFound } from './errors.js'
import { httpLog, serverLog } from './lib/log.js'
import { findCurrentUser, getCurrentUser, remoteUser, requestId } from './middleware/auth.js'
import { ok, takeFlashes } from './routes/_page.js'
import { createChkupdataRoutes } from './routes/chkupdata.js'
import { createExpressRoutes } from './routes/express.js'
import { createOcatDataPageRoutes } from './routes/ocatdatapage.js'
import { createOrupdateRoutes } from './routes/orupdate.js'
import { createRmSubmissionRoutes } from './routes/rm-submission.js'
import { createSchedulerRoutes } from './routes/scheduler.js'
import { sendErrorEmail } from './services/emailing.js'
import { NotFoundPage, ServerErrorPage } from './views/errors.js'
import { IndexPage } from './views/index.js'

export const APP_VERSION = '0.3.0'

export function createApp(deps: AppDeps) {
  // Pages link to their trailing-slash form (`/orupdate/`).
  const app = new Hono({ strict: false })

  app.use('*', requestId)
  app.use('*', logger((message) => httpLog.info(message)))

  // Health check (no identity needed)
  app.get('/health', (c) => ok(c, { status: 'ok', version: APP_VERSION, profile: deps.config.name }))

  app.use('*', remoteUser(deps))

  app.get('/', (c) => c.html(<IndexPage user={getCurrentUser(c)} flashes={takeFlashes(c)} />))
  app.get('/index', (c) => c.redirect('/'))

  app.route('/ocatdatapage', createOcatDataPageRoutes(deps))
  app.route('/chkupdata', createChkupdataRoutes(deps))
  app.route('/express', createExpressRoutes(deps))
  app.route('/orupdate', createOrupdateRoutes(deps))
  app.route('/rm_submission', createRmSubmissionRoutes(deps))
  app.route('/scheduler', createSchedulerRoutes(deps))

  // ============================================
  // Error Handling
  // ============================================

  app.onError(async (err, c) => {
    if (isNotFound(err)) {
      return c.html(<NotFoundPage message={err.message} />, 404)
    }
    serverLog.error(`${c.req.method} ${c.req.path} failed: ${err.message}`, err)
    await sendErrorEmail(deps.mailer, deps.config, err, findCurrentUser(c))
    return c.html(<ServerErrorPage />, 500)
  })

  app.notFound((c) => c.html(<NotFoundPage />, 404))

  return app
}

export type UsintApp = ReturnType<typeof createApp>
