import type { SchemaObject } from '@nestjs/swagger/dist/interfaces/open-api-spec.interface';

// -- Runtime --

export const DISPATCHER_SNAPSHOT_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    state: { type: 'string', enum: ['stopped', 'idle_polling', 'processing_batch'] },
    offset: { type: 'integer', nullable: true, example: 43 },
    lastUpdateId: { type: 'integer', nullable: true, example: 42 },
    processed: { type: 'integer', example: 120 },
    duplicates: { type: 'integer', example: 2 },
    rateLimited: { type: 'integer', example: 5 },
    handlerErrors: { type: 'integer', example: 0 },
    pollFailures: { type: 'integer', example: 1 },
    consecutivePollFailures: { type: 'integer', example: 0 },
    activeListeners: { type: 'integer', example: 1 },
    lastPollAtIso: { type: 'string', format: 'date-time', nullable: true },
    lastErrorMessage: { type: 'string', nullable: true },
    updatedAtIso: { type: 'string', format: 'date-time', nullable: true },
  },
  required: ['state', 'processed', 'duplicates', 'rateLimited', 'handlerErrors', 'pollFailures'],
};

// -- Health --

const COMPONENT_HEALTH_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    ok: { type: 'boolean' },
    details: { type: 'string' },
  },
  required: ['ok', 'details'],
};

export const HEALTH_STATUS_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    status: { type: 'string', enum: ['ok', 'degraded'] },
    telegram: COMPONENT_HEALTH_SCHEMA,
    dispatcher: COMPONENT_HEALTH_SCHEMA,
  },
  required: ['status', 'telegram', 'dispatcher'],
};
