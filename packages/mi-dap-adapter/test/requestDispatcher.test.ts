import { expect } from 'chai';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as sinon from 'sinon';
import { DebugProtocol } from '@vscode/debugprotocol';
import { Session } from 'mi-dap-core';
import { RequestDispatcher } from '../src/requestDispatcher';
import { FakeBackend, createTestSession, request, silentLogger } from './helpers';

const TWO_GROUPS = '^done,groups=[{id="i1",type="process",pid="1111"},{id="i2",type="process",pid="1234"}]';

function currentThreadOf(pid: number): string {
  return `^done,threads=[{id="1",target-id="Thread ${pid}.${pid}"}],current-thread-id="1"`;
}

describe('RequestDispatcher', () => {
  let backend: FakeBackend;
  let session: Session;
  let messages: DebugProtocol.ProtocolMessage[];
  let dispatcher: RequestDispatcher;

  beforeEach(() => {
    backend = new FakeBackend();
    session = createTestSession(backend);
    messages = [];
    session.events.setSink({ sendEvent: (event) => messages.push(event) });
    dispatcher = new RequestDispatcher(session, silentLogger, (message) => messages.push(message));
  });

  afterEach(() => session.channel.dispose());

  it('lists the commands it handles', () => {
    expect(RequestDispatcher.supportedCommands).to.include.members([
      'initialize',
      'launch',
      'attach',
      'addInferiors',
      'detachInferiors',
      'selectInferior',
      'listProcesses',
    ]);
  });

  describe('protocol handling', () => {
    it('answers initialize with capabilities and then the initialized event', async () => {
      await dispatcher.dispatch(request('initialize', { adapterID: 'gdb' }));

      expect(messages).to.have.length(2);
      expect(messages[0]).to.include({ type: 'response', request_seq: 1, command: 'initialize', success: true });
      expect(messages[0]).to.have.nested.property('body.supportsConfigurationDoneRequest', true);
      expect(messages[1]).to.deep.equal({ seq: 0, type: 'event', event: 'initialized' });
    });

    it('rejects an unsupported command', async () => {
      await dispatcher.dispatch(request('restartFrame', { frameId: 0 }, 7));

      expect(messages).to.deep.equal([
        {
          seq: 0,
          type: 'response',
          request_seq: 7,
          command: 'restartFrame',
          success: false,
          message: 'Unsupported command: restartFrame',
        },
      ]);
    });

    it('rejects a message that is not a request', async () => {
      const event: DebugProtocol.Event = { seq: 4, type: 'event', event: 'output' };

      await dispatcher.dispatch(event);

      expect(messages[0]).to.include({ request_seq: 4, command: '', success: false });
      expect(messages[0]).to.have.nested.property('body.error.id', 1001);
    });

    it('reports a missing argument', async () => {
      await dispatcher.dispatch(request('stackTrace', {}, 3));

      const message = "Missing or invalid parameter 'threadId' for stackTrace. Expected type: number.";
      expect(messages).to.deep.equal([
        {
          seq: 0,
          type: 'response',
          request_seq: 3,
          command: 'stackTrace',
          success: false,
          message,
          body: { error: { id: 1001, format: message, showUser: true } },
        },
      ]);
    });

    it('reports an unavailable backend', async () => {
      backend.crash();

      await dispatcher.dispatch(request('threads'));

      expect(messages[0]).to.include({ success: false, message: 'GDB is not running' });
      expect(messages[0]).to.have.nested.property('body.error.id', 1004);
    });
  });

  describe('launch and attach', () => {
    it('loads, stops at main and runs the program', async () => {
      backend.reply('-exec-run', '^running');

      await dispatcher.dispatch(
        request('launch', { program: '/bin/app', args: ['-v'], setupCommands: [{ text: 'set print pretty on' }] }),
      );

      expect(backend.written).to.deep.equal([
        'set print pretty on',
        '-file-exec-and-symbols /bin/app',
        '-exec-arguments -v',
        '-break-insert main',
        '-exec-run',
      ]);
      expect(messages).to.deep.equal([
        { seq: 0, type: 'response', request_seq: 1, command: 'launch', success: true, body: { spawnerPid: null } },
      ]);
      expect(session.events.isEnabled()).to.equal(true);
    });

    it('fails a launch of a missing program', async () => {
      await dispatcher.dispatch(request('launch', { program: '/bin/missing' }));

      expect(messages).to.deep.equal([
        {
          seq: 0,
          type: 'response',
          request_seq: 1,
          command: 'launch',
          success: false,
          message: 'The path /bin/missing does not exist',
          body: { spawnerPid: null },
        },
      ]);
      expect(backend.written).to.deep.equal([]);
      expect(session.events.isEnabled()).to.equal(false);
    });

    describe('through a program runner', () => {
      let programRunner: sinon.SinonStub<[string], Promise<number | null>>;

      beforeEach(() => {
        programRunner = sinon.stub<[string], Promise<number | null>>().resolves(0);
        dispatcher = new RequestDispatcher(session, silentLogger, (message) => messages.push(message), {
          programRunner,
        });
      });

      it('attaches to the spawner, catches its exec and runs the script', async () => {
        backend
          .reply('-info-os processes', '^done,OSDataTable={body=[item={col0="4321",col1="spawner"}]}')
          .reply('-list-thread-groups', '^done,groups=[]')
          .reply('-list-thread-groups', '^done,groups=[{id="i1",type="process",pid="4321"}]');

        await dispatcher.dispatch(
          request('launch', { programRunner: '/tmp/run.sh', processSpawner: 'spawner' }),
        );

        expect(backend.written).to.deep.equal([
          '-info-os processes',
          '-list-thread-groups',
          'attach 4321',
          '-list-thread-groups',
          'inferior 1',
          'catch exec',
          '-exec-continue',
        ]);
        expect(programRunner.calledOnceWithExactly('/tmp/run.sh')).to.equal(true);
        expect(session.events.isEnabled()).to.equal(true);
        expect(messages).to.deep.equal([
          { seq: 0, type: 'response', request_seq: 1, command: 'launch', success: true, body: { spawnerPid: 4321 } },
        ]);
      });

      it('requires the spawner name', async () => {
        await dispatcher.dispatch(request('launch', { programRunner: '/tmp/run.sh' }));

        expect(messages[0]).to.include({ success: false, message: 'processSpawner not specified' });
        expect(messages[0]).to.have.deep.property('body', { spawnerPid: null });
        expect(programRunner.called).to.equal(false);
      });

      it('fails when no process has the spawner name', async () => {
        await dispatcher.dispatch(request('launch', { programRunner: '/tmp/run.sh', processSpawner: 'spawner' }));

        expect(backend.written).to.deep.equal(['-info-os processes']);
        expect(messages[0]).to.include({ success: false, message: 'Unable to find the process spawner' });
        expect(programRunner.called).to.equal(false);
      });
    });

    it('attaches and reports an entry stop after the response', async () => {
      backend.reply('-list-thread-groups', TWO_GROUPS).reply('-list-thread-groups', TWO_GROUPS);

      await dispatcher.dispatch(request('attach', { pid: 1234 }));

      expect(messages).to.deep.equal([
        { seq: 0, type: 'response', request_seq: 1, command: 'attach', success: true },
        {
          seq: 0,
          type: 'event',
          event: 'stopped',
          body: { reason: 'entry', threadId: 1, allThreadsStopped: true, hitBreakpointIds: [] },
        },
      ]);
    });
  });

  describe('inspection', () => {
    it('pages a stack trace', async () => {
      backend.reply(
        '-stack-list-frames',
        '^done,stack=[frame={level="0",addr="0x1",func="a"},frame={level="1",addr="0x2",func="b"},' +
          'frame={level="2",addr="0x3",func="c"}]',
      );

      await dispatcher.dispatch(request('stackTrace', { threadId: 1, startFrame: 1, levels: 1 }));

      expect(messages[0]).to.have.deep.property('body', {
        stackFrames: [
          { id: 1, name: 'b', line: 0, column: 0, instructionPointerReference: '0x2', presentationHint: 'subtle' },
        ],
        totalFrames: 3,
      });
    });

    it('offers only the scopes a frame has', async () => {
      backend
        .reply('-stack-list-variables --all-values', '^done,variables=[{name="x",value="1"}]')
        .reply('-data-list-register-names', '^done,register-names=[]');

      await dispatcher.dispatch(request('scopes', { frameId: 0 }));

      expect(backend.written[0]).to.equal('-stack-select-frame 0');
      expect(messages[0]).to.have.deep.property('body', {
        scopes: [{ name: 'Locals', presentationHint: 'locals', variablesReference: 100000, expensive: false }],
      });
    });

    it('reports an unknown variables reference', async () => {
      await dispatcher.dispatch(request('variables', { variablesReference: 42 }));

      expect(messages[0]).to.include({ success: false, message: 'Unknown variables reference: 42' });
      expect(messages[0]).to.have.nested.property('body.error.id', 1002);
    });

    it('passes repl input to GDB and returns its console output', async () => {
      backend.reply('info sharedlibrary', '~"No shared libraries loaded at this time.\\n"', '^done');

      await dispatcher.dispatch(request('evaluate', { expression: 'info sharedlibrary', context: 'repl' }));

      expect(messages[0]).to.include({ success: true });
      expect(messages[0]).to.have.deep.property('body', {
        result: 'No shared libraries loaded at this time.',
        variablesReference: 0,
      });
    });

    it('evaluates an expression in a frame', async () => {
      backend.reply('-var-create - * "count"', '^done,name="var1",numchild="0",value="3",type="int"');

      await dispatcher.dispatch(request('evaluate', { expression: 'count', frameId: 2, context: 'watch' }));

      expect(backend.written).to.deep.equal(['-stack-select-frame 2', '-var-create - * "count"']);
      expect(messages[0]).to.have.deep.property('body', { result: '3', type: 'int', variablesReference: 0 });
    });

    it('sets breakpoints for a source file', async () => {
      backend.reply('-break-insert /src/main.c:4', '^done,bkpt={number="1"}');

      await dispatcher.dispatch(
        request('setBreakpoints', { source: { path: '/src/main.c' }, breakpoints: [{ line: 4 }] }),
      );

      expect(messages[0]).to.have.deep.property('body', {
        breakpoints: [{ id: 1, verified: true, line: 4, source: { path: '/src/main.c' }, message: '' }],
      });
    });
  });

  describe('inferiors', () => {
    it('lists processes with no current process', async () => {
      backend.reply('-info-os processes', '^done,OSDataTable={body=[item={col0="1",col1="init"}]}');

      await dispatcher.dispatch(request('listProcesses'));

      expect(messages[0]).to.have.deep.property('body', {
        processes: [{ pid: 1, name: 'init' }],
        currentProcess: null,
      });
    });

    it('refreshes the client before answering a detach', async () => {
      session.events.enable();
      backend
        .reply('-list-thread-groups', TWO_GROUPS)
        .reply('-thread-info', currentThreadOf(1234))
        .reply('-thread-info', currentThreadOf(1111));

      await dispatcher.dispatch(request('detachInferiors', { pids: [1234] }));

      expect(messages).to.deep.equal([
        { seq: 0, type: 'event', event: 'continued', body: { threadId: 1, allThreadsContinued: true } },
        {
          seq: 0,
          type: 'event',
          event: 'stopped',
          body: { reason: 'detach inferior', threadId: 1, allThreadsStopped: true, hitBreakpointIds: [] },
        },
        {
          seq: 0,
          type: 'response',
          request_seq: 1,
          command: 'detachInferiors',
          success: true,
          body: { newCurrentPid: 1111 },
        },
      ]);
    });

    it('hands debugging over from the spawner to the new program', async () => {
      backend
        .reply('-list-thread-groups', '^done,groups=[{id="i1",type="process",pid="4321"},{id="i2",type="process",pid="5555"}]')
        .reply('-thread-info', currentThreadOf(4321))
        .reply('-info-os processes', '^done,OSDataTable={body=[item={col0="5555",col1="app"}]}')
        .reply('-thread-info', currentThreadOf(5555));

      await dispatcher.dispatch(request('handleNewProcess', { spawnerPid: 4321, program: '/bin/app' }));

      expect(backend.written).to.deep.equal([
        '-list-thread-groups',
        '-thread-info',
        'inferior 2',
        'detach inferior 1',
        'remove-inferior 1',
        'file /bin/app',
        '-break-insert main',
        '-info-os processes',
        '-thread-info',
        '-exec-continue',
      ]);
      expect(messages).to.deep.equal([
        {
          seq: 0,
          type: 'response',
          request_seq: 1,
          command: 'handleNewProcess',
          success: true,
          body: { processes: [{ pid: 5555, name: 'app' }], currentProcess: 5555 },
        },
      ]);
    });

    it('stops after a process exit when no inferior remains', async () => {
      await dispatcher.dispatch(request('continueAfterProcessExit'));

      expect(backend.written).to.deep.equal(['-list-thread-groups']);
      expect(messages[0]).to.have.deep.property('body', { continue: false });
    });

    it('refreshes the remaining inferior after a process exit', async () => {
      backend
        .reply('-list-thread-groups', '^done,groups=[{id="i2",type="process",pid="5555"}]')
        .reply('-thread-info', currentThreadOf(5555));

      await dispatcher.dispatch(request('continueAfterProcessExit'));

      expect(backend.written).to.deep.equal(['-list-thread-groups', '-thread-info', '-exec-continue', '-exec-interrupt']);
      expect(messages[0]).to.include({ success: true });
      expect(messages[0]).to.have.deep.property('body', { continue: true });
    });

    it('fails to select a pid without an inferior', async () => {
      await dispatcher.dispatch(request('selectInferior', { pid: 9 }));

      expect(messages[0]).to.include({ success: false, message: 'Failed to switch to inferior for PID 9' });
    });

    it('rejects a pid list of the wrong type', async () => {
      await dispatcher.dispatch(request('addInferiors', { pids: ['12'] }));

      expect(messages[0]).to.include({
        success: false,
        message: "Missing or invalid parameter 'pids' for addInferiors. Expected type: number[].",
      });
    });
  });

  describe('source', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dispatcher-source-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('returns the content of a source file', async () => {
      const file = path.join(tempDir, 'main.c');
      fs.writeFileSync(file, 'int main(void) { return 0; }\n');

      await dispatcher.dispatch(request('source', { source: { path: file } }));

      expect(messages[0]).to.have.deep.property('body', { content: 'int main(void) { return 0; }\n' });
    });

    it('reports a missing source file', async () => {
      const file = path.join(tempDir, 'gone.c');

      await dispatcher.dispatch(request('source', { source: { path: file } }));

      expect(messages[0]).to.include({ success: false, message: `Source file not found: ${file}` });
    });
  });

  it('stops GDB on disconnect', async () => {
    await dispatcher.dispatch(request('disconnect'));

    expect(backend.isRunning()).to.equal(false);
    expect(messages).to.deep.equal([
      { seq: 0, type: 'response', request_seq: 1, command: 'disconnect', success: true },
    ]);
  });
});
