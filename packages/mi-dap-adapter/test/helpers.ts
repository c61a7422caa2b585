import { DebugProtocol } from '@vscode/debugprotocol';
import { BackendConfig, Session } from 'mi-dap-core';
import { FakeBackend, silentLogger } from '../../mi-dap-core/test/mocks/fakeBackend';

export { FakeBackend, silentLogger };

export const TEST_CONFIG: BackendConfig = {
  gdbPath: 'gdb',
  commandTimeoutMs: 1000,
  initCommands: [],
  sharedSettings: [],
};

export function createTestSession(backend: FakeBackend): Session {
  return new Session(backend, TEST_CONFIG, silentLogger, { pathExists: (path) => path === '/bin/app' });
}

export function request(command: string, args?: Record<string, unknown>, seq: number = 1): DebugProtocol.Request {
  const message: DebugProtocol.Request = { seq, type: 'request', command };
  if (args !== undefined) {
    message.arguments = args;
  }
  return message;
}
