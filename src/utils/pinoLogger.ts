import pino from 'pino'
import { context, trace } from '@opentelemetry/api'
import { config } from '@/config'

const isProduction = process.env.NODE_ENV === 'production'
const isTest = process.env.NODE_ENV === 'test'

const defaultLevel = isTest ? 'silent' : isProduction ? 'info' : 'debug'

const logger = pino({
  level: config.LOG_LEVEL || defaultLevel,
  base : {
    service : config.SERVICE_NAME
  },
  transport: !isProduction && !isTest
    ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:standard' } }
    : undefined,
})

type LogMeta = Record<string, unknown>

// trace & span ids of the active span, if any
function getTraceContext(): LogMeta {
  const span = trace.getSpan(context.active())
  if (!span) return {}
  const spanContext = span.spanContext()
  return {
    traceId: spanContext.traceId,
    spanId: spanContext.spanId,
  }
}

const baseLogger = {
  info: (msg: string, meta?: LogMeta) => logger.info({ ...getTraceContext(), ...meta }, msg),
  error: (msg: string, meta?: LogMeta) => logger.error({ ...getTraceContext(), ...meta }, msg),
  warn: (msg: string, meta?: LogMeta) => logger.warn({ ...getTraceContext(), ...meta }, msg),
  debug: (msg: string, meta?: LogMeta) => logger.debug({ ...getTraceContext(), ...meta }, msg),
}

export default baseLogger
