export * from './lib/api'
export * from './lib/urgency'
export * from './lib/due-date'
export * from './lib/next-action-form'
