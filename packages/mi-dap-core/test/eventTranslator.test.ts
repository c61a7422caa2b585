import { expect } from 'chai';
import * as sinon from 'sinon';
import { DebugProtocol } from '@vscode/debugprotocol';
import { EventTranslator } from '../src/eventTranslator';
import { parseMiLine } from '../src/mi/miParser';
import { BackendRecord } from '../src/mi/miRecords';
import { silentLogger } from './mocks/fakeBackend';

function record(line: string): BackendRecord {
  const parsed = parseMiLine(line);
  if (!parsed) {
    throw new Error(`not a record: ${line}`);
  }
  return parsed;
}

describe('EventTranslator', () => {
  let translator: EventTranslator;
  let events: DebugProtocol.Event[];

  beforeEach(() => {
    translator = new EventTranslator(silentLogger);
    events = [];
    translator.setSink({ sendEvent: (event) => events.push(event) });
  });

  it('starts with delivery disabled', () => {
    expect(translator.isEnabled()).to.equal(false);
    expect(translator.notify(record('*stopped,reason="signal-received",thread-id="3"'))).to.equal(true);
    expect(events).to.deep.equal([]);
  });

  describe('when enabled', () => {
    beforeEach(() => translator.enable());

    it('translates a breakpoint stop', () => {
      translator.notify(
        record('*stopped,reason="breakpoint-hit",disp="keep",bkptno="2",thread-id="3",stopped-threads="all"'),
      );
      expect(events).to.deep.equal([
        {
          seq: 0,
          type: 'event',
          event: 'stopped',
          body: { reason: 'breakpoint-hit', threadId: 3, allThreadsStopped: true, hitBreakpointIds: [2] },
        },
      ]);
    });

    it('defaults the reason and thread of a bare stop', () => {
      translator.notify(record('*stopped'));
      expect(events[0].body).to.deep.equal({
        reason: 'unknown',
        threadId: 1,
        allThreadsStopped: false,
        hitBreakpointIds: [],
      });
    });

    it('follows a continued event with a stacks invalidation', () => {
      translator.notify(record('*running,thread-id="all"'));
      expect(events.map((event) => event.event)).to.deep.equal(['continued', 'invalidated']);
      expect(events[0].body).to.deep.equal({ threadId: 1, allThreadsContinued: true });
      expect(events[1].body).to.deep.equal({ areas: ['stacks'] });
    });

    it('continues a single thread', () => {
      translator.notify(record('*running,thread-id="4"'));
      expect(events[0].body).to.deep.equal({ threadId: 4, allThreadsContinued: false });
    });

    it('reports new and exited processes', () => {
      translator.notify(record('=thread-group-started,id="i2",pid="4321"'));
      translator.notify(record('=thread-group-exited,id="i2",exit-code="012"'));
      expect(events).to.deep.equal([
        { seq: 0, type: 'event', event: 'newProcess', body: { groupId: 'i2', pid: 4321 } },
        { seq: 0, type: 'event', event: 'exitedProcess', body: { groupId: 'i2', exitCode: 10 } },
      ]);
    });

    it('leaves other records to the caller', () => {
      expect(translator.notify(record('=breakpoint-modified,bkpt={number="1"}'))).to.equal(false);
      expect(translator.notify(record('^done'))).to.equal(false);
      expect(translator.notify(record('~"stopped"'))).to.equal(false);
      expect(events).to.deep.equal([]);
    });

    it('logs and survives a failing sink', () => {
      translator.setSink({
        sendEvent: () => {
          throw new Error('socket closed');
        },
      });
      expect(() => translator.notifyStopped('pause', 1, true)).not.to.throw();
    });
  });

  describe('suspend', () => {
    it('restores the previous state on release', () => {
      translator.enable();
      const guard = translator.suspend();
      expect(translator.isEnabled()).to.equal(false);
      translator.notifyStopped('step', 1, false);
      guard.release();
      expect(translator.isEnabled()).to.equal(true);
      expect(events).to.deep.equal([]);
    });

    it('keeps delivery disabled when it was disabled before', () => {
      const guard = translator.suspend();
      guard.release();
      expect(translator.isEnabled()).to.equal(false);
    });

    it('ignores a second release', () => {
      translator.enable();
      const guard = translator.suspend();
      guard.release();
      translator.disable();
      guard.release();
      expect(translator.isEnabled()).to.equal(false);
    });

    it('restores the state when the suspended operation throws', async () => {
      translator.enable();
      const operation = sinon.stub().rejects(new Error('attach failed'));

      const outcome = await translator.runSuspended(operation).catch((error: Error) => error.message);

      expect(outcome).to.equal('attach failed');
      expect(translator.isEnabled()).to.equal(true);
    });

    it('returns the value of the suspended operation', async () => {
      translator.enable();
      const seen: boolean[] = [];
      const value = await translator.runSuspended(async () => {
        seen.push(translator.isEnabled());
        return 7;
      });
      expect(value).to.equal(7);
      expect(seen).to.deep.equal([false]);
    });
  });
});
