export * from './schema/_common'
export * from './schema/tenants'
export * from './schema/opportunities'

export * from './id'
export * from './client'
export * from './demo'
