export * from './logging';
export * from './errors';
export * from './common/events';
export * from './common/messageChannel';
export * from './mi/miRecords';
export * from './mi/miParser';
export * from './dap/messages';
export * from './dap/framer';
export * from './config/backendConfigLoader';
export * from './backendConnection';
export * from './backendProcess';
export * from './commandChannel';
export * from './eventTranslator';
export * from './variableReferenceTree';
export * from './inferiorOrchestrator';
export * from './breakpointManager';
export * from './executionManager';
export * from './threadManager';
export * from './stackTraceManager';
export * from './session';
