export * from './ConcurrentExecutor'
export * from './GroupAggregator'
export * from './GroupSequencer'
export * from './Outcome'
export * from './ResultCollector'
export * from './TestDescriptor'
export * from './TestError'
export * from './TestGroup'
export * from './TestRunner'
export * from './TimeoutGuard'
export * from './UnitOfWork'
