import * as Sentry from '@sentry/node'

let initialized = false

export const initDiagnostics = (args: { dsn?: string; environment?: string }) => {
  if (initialized) return
  if (!args.dsn) return

  Sentry.init({
    dsn: args.dsn,
    environment: args.environment,
    sendDefaultPii: false,
    tracesSampleRate: 0.05,
    beforeSend(event) {
      // Household finance data stays on the server.
      return {
        ...event,
        request: undefined,
        user: undefined,
        breadcrumbs: undefined,
        contexts: undefined,
        extra: undefined,
      }
    },
  })

  initialized = true
}

export const diagnosticsEnabled = () => initialized

export const captureException = (error: unknown) => {
  if (!initialized) return
  Sentry.captureException(error)
}
