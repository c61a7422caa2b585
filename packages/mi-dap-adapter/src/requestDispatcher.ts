import * as fs from 'fs';
import { DebugProtocol } from '@vscode/debugprotocol';
import {
  BreakpointSpec,
  CommandResult,
  LoggerInterface,
  OsProcess,
  ProtocolViolationError,
  Session,
  checkRecords,
  childLogger,
  consoleText,
  createEvent,
  createResponse,
  errorMessage,
  isRequest,
} from 'mi-dap-core';
import { DapErrorBuilder } from './errorUtils';
import { ProgramRunner, createBashProgramRunner } from './programRunner';
import {
  AttachArgs,
  BackendSetupArgs,
  ContinueAfterProcessExitResponseBody,
  HandleNewProcessArgs,
  LaunchArgs,
  LaunchResponseBody,
  ListProcessesResponseBody,
  RequestArgs,
} from './types/requestArgs';

export type Emit = (message: DebugProtocol.ProtocolMessage) => void;

export interface RequestDispatcherOptions {
  /** Runs `launch`'s `programRunner` script; bash by default. */
  programRunner?: ProgramRunner;
}

interface RequestContext {
  session: Session;
  logger: LoggerInterface;
  emit: Emit;
  runProgram: ProgramRunner;
}

type RequestHandler = (
  context: RequestContext,
  request: DebugProtocol.Request,
  args: RequestArgs,
) => Promise<void>;

const CAPABILITIES: DebugProtocol.Capabilities = {
  supportsConfigurationDoneRequest: true,
  supportsConditionalBreakpoints: true,
  supportsBreakpointLocationsRequest: true,
  supportsEvaluateForHovers: false,
  supportsSetVariable: false,
  supportsTerminateRequest: false,
  supportsSingleThreadExecutionRequests: true,
};

function respond(
  context: RequestContext,
  request: DebugProtocol.Request,
  result: CommandResult,
  body?: unknown,
): void {
  context.emit(createResponse(request, result.success, result.message, body));
}

/** Runs `setupCommands`, then connects to `gdbServer` when one is given. */
async function applyBackendSetup(session: Session, setup: BackendSetupArgs): Promise<CommandResult> {
  for (const command of setup.setupCommands ?? []) {
    const result = await session.channel.sendChecked(command.text, command.ignoreFailures);
    if (!result.success) {
      return result;
    }
  }
  if (setup.gdbServer) {
    return session.inferiors.connectToGdbServer(setup.gdbServer);
  }
  return { success: true, message: '' };
}

const handleInitialize: RequestHandler = async (context, request) => {
  context.emit(createResponse(request, true, undefined, CAPABILITIES));
  context.emit(createEvent('initialized'));
};

const handleConfigurationDone: RequestHandler = async (context, request) => {
  context.emit(createResponse(request));
};

/**
 * Loads the program, stops at `main` and starts it. Event delivery is
 * switched on before `-exec-run` so the first stop reaches the client.
 */
async function launchProgram(session: Session, program: string, programArgs: string[]): Promise<CommandResult> {
  const loaded = await session.execution.loadExecutableAndSymbols(program);
  if (!loaded.success) {
    return loaded;
  }
  await session.execution.setProgramArguments(programArgs);
  await session.breakpoints.setBreakpointOnMain();
  session.events.enable();
  return session.execution.run();
}

/**
 * Attaches to the running spawner, stops it at its next exec and runs the
 * program runner script, which makes the spawner start the program.
 */
async function launchThroughRunner(
  { session, logger, runProgram }: RequestContext,
  programRunner: string,
  processSpawner: string | undefined,
): Promise<{ result: CommandResult; spawnerPid: number | null }> {
  if (!processSpawner) {
    return { result: { success: false, message: 'processSpawner not specified' }, spawnerPid: null };
  }
  const spawnerPid = await session.inferiors.getPidByName(processSpawner);
  if (spawnerPid === null) {
    return { result: { success: false, message: `Unable to find the process ${processSpawner}` }, spawnerPid: null };
  }

  const result = await session.inferiors.attach(spawnerPid);
  if (!result.success) {
    return { result, spawnerPid };
  }
  await session.breakpoints.setExecCatchpoint();
  await session.execution.continue();
  session.events.enable();

  const exitCode = await runProgram(programRunner);
  if (exitCode !== 0) {
    logger.warn(`Program runner ${programRunner} exited with code ${exitCode}`);
  }
  return { result, spawnerPid };
}

const handleLaunch: RequestHandler = async (context, request, args) => {
  const programRunner = args.optionalString('programRunner');
  const launch: LaunchArgs = {
    program: programRunner ? args.optionalString('program') : args.requireString('program'),
    args: args.stringList('args'),
    setupCommands: args.setupCommands(),
    gdbServer: args.optionalString('gdbServer'),
    programRunner,
    processSpawner: args.optionalString('processSpawner'),
  };

  let result = await applyBackendSetup(context.session, launch);
  let spawnerPid: number | null = null;
  if (result.success) {
    if (launch.programRunner) {
      ({ result, spawnerPid } = await launchThroughRunner(context, launch.programRunner, launch.processSpawner));
    } else {
      result = await launchProgram(context.session, launch.program ?? '', launch.args ?? []);
    }
  }
  const body: LaunchResponseBody = { spawnerPid };
  context.emit(createResponse(request, result.success, result.message, body));
};

/**
 * Hands debugging over from the spawner to the program it exec'd: detaches
 * the spawner, loads the program's symbols and breaks on its `main`. The
 * program is continued after the response.
 */
const handleNewProcess: RequestHandler = async ({ session, logger, emit }, request, args) => {
  const newProcess: HandleNewProcessArgs = {
    spawnerPid: args.requireNumber('spawnerPid'),
    program: args.optionalString('program'),
  };

  const detached = await session.inferiors.detachInferiors([newProcess.spawnerPid]);
  if (!detached.success) {
    logger.warn(detached.message);
  }
  let result = await session.inferiors.loadProgramSymbols(newProcess.program);
  let processes: OsProcess[] = [];
  if (result.success) {
    result = await session.breakpoints.setBreakpointOnMain();
  }
  if (result.success) {
    ({ result, processes } = await session.inferiors.listProcesses());
  }
  const body: ListProcessesResponseBody = { processes, currentProcess: await session.inferiors.currentPid() };
  emit(createResponse(request, result.success, result.message, body));

  await session.execution.continue();
};

/**
 * Tells the client whether debugging goes on after a process exited. When
 * inferiors remain, a continue and interrupt pair refreshes GDB's and the
 * client's view of the current one.
 */
const handleContinueAfterProcessExit: RequestHandler = async ({ session, emit }, request) => {
  const body: ContinueAfterProcessExitResponseBody = {
    continue: (await session.inferiors.listInferiors()).length > 0,
  };
  if (body.continue) {
    await session.execution.continue();
    await session.execution.pause();
  }
  emit(createResponse(request, true, undefined, body));
};

const handleAttach: RequestHandler = async ({ session, emit }, request, args) => {
  const attach: AttachArgs = {
    pid: args.requireNumber('pid'),
    program: args.optionalString('program'),
    setupCommands: args.setupCommands(),
    gdbServer: args.optionalString('gdbServer'),
  };

  let result = await applyBackendSetup(session, attach);
  if (result.success) {
    result = await session.inferiors.attach(attach.pid, attach.program);
  }
  emit(createResponse(request, result.success, result.message));

  session.events.enable();
  session.events.notifyStopped('entry', 1, true);
};

/** Answered before GDB stops, since GDB's exit shuts the server down. */
const handleDisconnect: RequestHandler = async ({ session, emit }, request) => {
  emit(createResponse(request));
  await session.stop();
};

const handleThreads: RequestHandler = async (context, request) => {
  const { threads, ...result } = await context.session.threads.getThreads();
  respond(context, request, result, { threads });
};

const handleStackTrace: RequestHandler = async (context, request, args) => {
  const threadId = args.requireNumber('threadId');
  const startFrame = args.optionalNumber('startFrame') ?? 0;
  const levels = args.optionalNumber('levels') ?? 0;

  const { stackFrames, ...result } = await context.session.stackTrace.getStackTrace(threadId);
  const end = levels > 0 ? startFrame + levels : undefined;
  respond(context, request, result, {
    stackFrames: stackFrames.slice(startFrame, end),
    totalFrames: stackFrames.length,
  });
};

/** Locals and Registers scopes, each offered only when the frame has any. */
const handleScopes: RequestHandler = async (context, request, args) => {
  const frameId = args.requireNumber('frameId');
  const { session } = context;

  const selected = await session.selectFrame(frameId);
  if (!selected.success) {
    respond(context, request, selected);
    return;
  }

  const scopes: DebugProtocol.Scope[] = [];
  if (await session.variables.hasLocals()) {
    scopes.push({
      name: 'Locals',
      presentationHint: 'locals',
      variablesReference: session.variables.localsHandle(frameId),
      expensive: false,
    });
  }
  if (await session.variables.hasRegisters()) {
    scopes.push({
      name: 'Registers',
      presentationHint: 'registers',
      variablesReference: session.variables.registersHandle(frameId),
      expensive: false,
    });
  }
  context.emit(createResponse(request, true, undefined, { scopes }));
};

const handleVariables: RequestHandler = async ({ session, emit }, request, args) => {
  const variables = await session.variables.resolve(args.requireNumber('variablesReference'));
  emit(createResponse(request, true, undefined, { variables }));
};

/**
 * `repl` input is passed to GDB as a command and answered with its console
 * output; any other context evaluates the text as an expression.
 */
const handleEvaluate: RequestHandler = async ({ session, emit }, request, args) => {
  const expression = args.requireString('expression');
  const frameId = args.optionalNumber('frameId');

  if (args.optionalString('context') === 'repl') {
    const records = await session.channel.send(expression);
    const result = checkRecords(records);
    emit(
      createResponse(request, result.success, result.message, {
        result: consoleText(records).trimEnd(),
        variablesReference: 0,
      }),
    );
    return;
  }

  if (frameId !== undefined) {
    const selected = await session.selectFrame(frameId);
    if (!selected.success) {
      emit(createResponse(request, false, selected.message));
      return;
    }
  }
  const variable = await session.variables.createForName(expression);
  emit(
    createResponse(request, true, undefined, {
      result: variable.value,
      type: variable.type,
      variablesReference: variable.variablesReference,
    }),
  );
};

const handleContinue: RequestHandler = async (context, request, args) => {
  const result = await context.session.execution.continue(args.optionalNumber('threadId'));
  respond(context, request, result, { allThreadsContinued: true });
};

const handlePause: RequestHandler = async (context, request, args) => {
  respond(context, request, await context.session.execution.pause(args.optionalNumber('threadId')));
};

const handleNext: RequestHandler = async (context, request, args) => {
  respond(context, request, await context.session.execution.next(args.optionalNumber('threadId')));
};

const handleStepIn: RequestHandler = async (context, request, args) => {
  respond(context, request, await context.session.execution.stepIn(args.optionalNumber('threadId')));
};

const handleStepOut: RequestHandler = async (context, request, args) => {
  const result = await context.session.execution.stepOut(
    args.optionalNumber('threadId'),
    args.optionalBoolean('singleThread') ?? false,
  );
  respond(context, request, result);
};

const handleSetBreakpoints: RequestHandler = async (context, request, args) => {
  const sourcePath = args.sourcePath();
  const specs: BreakpointSpec[] = args.objectList('breakpoints').map((entry) => ({
    line: typeof entry['line'] === 'number' ? entry['line'] : undefined,
    condition: typeof entry['condition'] === 'string' ? entry['condition'] : undefined,
  }));
  const { breakpoints, ...result } = await context.session.breakpoints.setBreakpoints(sourcePath, specs);
  respond(context, request, result, { breakpoints });
};

const handleBreakpointLocations: RequestHandler = async (context, request, args) => {
  const { breakpoints, ...result } = await context.session.breakpoints.getBreakpointLocations(
    args.sourcePath(),
    args.requireNumber('line'),
    args.optionalNumber('endLine'),
  );
  respond(context, request, result, { breakpoints });
};

const handleListProcesses: RequestHandler = async (context, request) => {
  const { result, processes } = await context.session.inferiors.listProcesses();
  const body: ListProcessesResponseBody = {
    processes,
    currentProcess: await context.session.inferiors.currentPid(),
  };
  respond(context, request, result, body);
};

const handleAddInferiors: RequestHandler = async ({ session, emit }, request, args) => {
  const outcome = await session.inferiors.addInferiorsWithPids(args.numberList('pids'));
  emit(createResponse(request, true, undefined, outcome));
};

/**
 * Detaches the given processes and tells the client to refresh its view
 * with a continued/stopped pair before answering.
 */
const handleDetachInferiors: RequestHandler = async ({ session, emit }, request, args) => {
  const result = await session.inferiors.detachInferiors(args.numberList('pids'));
  const currentPid = await session.inferiors.currentPid();

  session.events.notifyContinued(1, true);
  session.events.notifyStopped('detach inferior', 1, true);

  emit(createResponse(request, result.success, result.message, { newCurrentPid: currentPid }));
};

const handleSelectInferior: RequestHandler = async ({ session, emit }, request, args) => {
  const pid = args.requireNumber('pid');
  const switched = await session.inferiors.selectInferior(pid);
  emit(
    createResponse(request, switched, switched ? 'Switched to inferior' : `Failed to switch to inferior for PID ${pid}`),
  );
};

const handleSource: RequestHandler = async ({ emit }, request, args) => {
  const sourcePath = args.sourcePath();
  try {
    const content = await fs.promises.readFile(sourcePath, 'utf8');
    emit(createResponse(request, true, undefined, { content }));
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    const message =
      code === 'ENOENT'
        ? `Source file not found: ${sourcePath}`
        : `Error reading source file: ${errorMessage(error)}`;
    emit(createResponse(request, false, message));
  }
};

/**
 * Routes decoded requests to their handlers. Handlers write responses and
 * events through `emit` in the order the client must see them; anything a
 * handler throws becomes a failed response.
 */
export class RequestDispatcher {
  private static readonly handlers: ReadonlyMap<string, RequestHandler> = new Map<string, RequestHandler>([
    ['initialize', handleInitialize],
    ['configurationDone', handleConfigurationDone],
    ['launch', handleLaunch],
    ['attach', handleAttach],
    ['disconnect', handleDisconnect],
    ['threads', handleThreads],
    ['stackTrace', handleStackTrace],
    ['scopes', handleScopes],
    ['variables', handleVariables],
    ['evaluate', handleEvaluate],
    ['continue', handleContinue],
    ['pause', handlePause],
    ['next', handleNext],
    ['stepIn', handleStepIn],
    ['stepOut', handleStepOut],
    ['setBreakpoints', handleSetBreakpoints],
    ['breakpointLocations', handleBreakpointLocations],
    ['listProcesses', handleListProcesses],
    ['addInferiors', handleAddInferiors],
    ['detachInferiors', handleDetachInferiors],
    ['handleNewProcess', handleNewProcess],
    ['continueAfterProcessExit', handleContinueAfterProcessExit],
    ['selectInferior', handleSelectInferior],
    ['source', handleSource],
  ]);

  public static get supportedCommands(): string[] {
    return [...RequestDispatcher.handlers.keys()];
  }

  private readonly context: RequestContext;

  constructor(session: Session, logger: LoggerInterface, emit: Emit, options: RequestDispatcherOptions = {}) {
    const dispatcherLogger = childLogger(logger, { className: 'RequestDispatcher' });
    this.context = {
      session,
      logger: dispatcherLogger,
      emit,
      runProgram: options.programRunner ?? createBashProgramRunner(dispatcherLogger),
    };
  }

  public async dispatch(message: DebugProtocol.ProtocolMessage): Promise<void> {
    if (!isRequest(message)) {
      const error = new ProtocolViolationError(`Expected a request, got a message of type '${message.type}'`);
      this.context.emit(new DapErrorBuilder().error(error).request({ seq: message.seq, command: '' }).build());
      return;
    }

    const handler = RequestDispatcher.handlers.get(message.command);
    if (!handler) {
      this.context.logger.warn(`Unsupported command: ${message.command}`);
      this.context.emit(createResponse(message, false, `Unsupported command: ${message.command}`));
      return;
    }

    this.context.logger.debug({ command: message.command, seq: message.seq }, 'Handling request');
    try {
      await handler(this.context, message, new RequestArgs(message));
    } catch (error) {
      this.context.logger.error({ err: error, command: message.command }, 'Request failed');
      this.context.emit(new DapErrorBuilder().error(error).request(message).build());
    }
  }
}
