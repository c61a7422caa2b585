import { expect } from 'chai';
import { BreakpointManager } from '../src/breakpointManager';
import { CommandChannel } from '../src/commandChannel';
import { EventTranslator } from '../src/eventTranslator';
import { FakeBackend, silentLogger } from './mocks/fakeBackend';

const SOURCE = '/src/app/main.c';

describe('BreakpointManager', () => {
  let backend: FakeBackend;
  let channel: CommandChannel;
  let manager: BreakpointManager;

  beforeEach(() => {
    backend = new FakeBackend();
    channel = new CommandChannel(backend, new EventTranslator(silentLogger), silentLogger);
    manager = new BreakpointManager(channel, silentLogger);
  });

  afterEach(() => channel.dispose());

  describe('setBreakpoints', () => {
    it('inserts each requested line and reports GDB numbers', async () => {
      backend
        .reply(`-break-insert ${SOURCE}:10`, `^done,bkpt={number="1",type="breakpoint",fullname="${SOURCE}",line="10"}`)
        .reply(`-break-insert -c "i == 3" ${SOURCE}:14`, `^done,bkpt={number="2",type="breakpoint",line="14"}`);

      const result = await manager.setBreakpoints(SOURCE, [{ line: 10 }, { line: 14, condition: 'i == 3' }, {}]);

      expect(backend.written).to.deep.equal([
        '-break-list',
        `-break-insert ${SOURCE}:10`,
        `-break-insert -c "i == 3" ${SOURCE}:14`,
      ]);
      expect(result).to.deep.equal({
        success: true,
        message: '',
        breakpoints: [
          { id: 1, verified: true, line: 10, source: { path: SOURCE }, message: '' },
          { id: 2, verified: true, line: 14, source: { path: SOURCE }, message: '' },
        ],
      });
    });

    it('returns an unverified breakpoint when GDB rejects the line', async () => {
      backend.reply(`-break-insert ${SOURCE}:999`, '^error,msg="No line 999 in file \\"main.c\\"."');

      const result = await manager.setBreakpoints(SOURCE, [{ line: 999 }]);

      expect(result.success).to.equal(true);
      expect(result.breakpoints).to.deep.equal([
        {
          verified: false,
          line: 999,
          source: { path: SOURCE },
          message: 'Error from GDB: No line 999 in file "main.c".',
        },
      ]);
    });

    it('escapes quotes in a condition', async () => {
      await manager.setBreakpoints(SOURCE, [{ line: 3, condition: 'name == "x"' }]);

      expect(backend.written[1]).to.equal(`-break-insert -c "name == \\"x\\"" ${SOURCE}:3`);
    });

    it('replaces the breakpoints set earlier for the file', async () => {
      backend
        .reply(`-break-insert ${SOURCE}:10`, '^done,bkpt={number="7"}')
        .reply('-break-list', '^done,BreakpointTable={nr_rows="0",body=[]}')
        .reply('-break-list', '^done,BreakpointTable={nr_rows="1",body=[bkpt={number="7",line="10"}]}');

      await manager.setBreakpoints(SOURCE, [{ line: 10 }]);
      await manager.setBreakpoints(SOURCE, []);

      expect(backend.written.slice(2)).to.deep.equal(['-break-list', '-break-delete 7']);
      expect(manager.listForSource(SOURCE)).to.deep.equal([]);
    });

    it('gives the same breakpoints when the same list is set again', async () => {
      backend
        .reply('-break-list', '^done,BreakpointTable={nr_rows="0",body=[]}')
        .reply(
          '-break-list',
          `^done,BreakpointTable={nr_rows="2",body=[bkpt={number="1",fullname="${SOURCE}",line="10"},` +
            `bkpt={number="2",fullname="${SOURCE}",line="14"}]}`,
        )
        .reply(`-break-insert ${SOURCE}:10`, '^done,bkpt={number="1"}')
        .reply(`-break-insert ${SOURCE}:10`, '^done,bkpt={number="3"}')
        .reply(`-break-insert ${SOURCE}:14`, '^done,bkpt={number="2"}')
        .reply(`-break-insert ${SOURCE}:14`, '^done,bkpt={number="4"}');
      const specs = [{ line: 10 }, { line: 14 }];

      const first = await manager.setBreakpoints(SOURCE, specs);
      const second = await manager.setBreakpoints(SOURCE, specs);

      expect(backend.written.slice(3)).to.deep.equal([
        '-break-list',
        '-break-delete 1',
        '-break-delete 2',
        `-break-insert ${SOURCE}:10`,
        `-break-insert ${SOURCE}:14`,
      ]);
      expect(second.breakpoints.map((breakpoint) => breakpoint.line)).to.deep.equal(
        first.breakpoints.map((breakpoint) => breakpoint.line),
      );
      expect(second.breakpoints.map((breakpoint) => breakpoint.id)).to.deep.equal([3, 4]);
      expect(manager.listForSource(SOURCE).map((breakpoint) => breakpoint.line)).to.deep.equal([10, 14]);
    });
  });

  describe('clear', () => {
    it('deletes breakpoints of the file by file name or location', async () => {
      backend.reply(
        '-break-list',
        '^done,BreakpointTable={nr_rows="3",body=[' +
          `bkpt={number="1",fullname="${SOURCE}",line="4"},` +
          'bkpt={number="2",fullname="/src/app/util.c",line="9"},' +
          `bkpt={number="3",type="breakpoint",locations=[{number="3.1",fullname="${SOURCE}"}]}]}`,
      );

      const deleted = await manager.clear(SOURCE);

      expect(deleted).to.deep.equal(['1', '3']);
      expect(backend.written).to.deep.equal(['-break-list', '-break-delete 1', '-break-delete 3']);
    });
  });

  describe('getBreakpointLocations', () => {
    const lines =
      '^done,lines=[{pc="0x1139",line="5"},{pc="0x1141",line="6"},{pc="0x1150",line="6"},' +
      '{pc="0x1160",line="9"},{pc="0x1170",line="3"}]';

    it('finds an exact line', async () => {
      backend.reply(`-symbol-list-lines ${SOURCE}`, lines);

      const result = await manager.getBreakpointLocations(SOURCE, 6);

      expect(result.breakpoints).to.deep.equal([{ line: 6 }]);
    });

    it('finds sorted distinct lines within a range', async () => {
      backend.reply(`-symbol-list-lines ${SOURCE}`, lines);

      const result = await manager.getBreakpointLocations(SOURCE, 3, 6);

      expect(result.breakpoints).to.deep.equal([{ line: 3 }, { line: 5 }, { line: 6 }]);
    });

    it('reports a file GDB has no line table for', async () => {
      backend.reply(`-symbol-list-lines ${SOURCE}`, '^error,msg="No symbol table is loaded."');

      const result = await manager.getBreakpointLocations(SOURCE, 1);

      expect(result).to.deep.equal({
        success: false,
        message: 'Error from GDB: No symbol table is loaded.',
        breakpoints: [],
      });
    });
  });

  it('sets a breakpoint on main and an exec catchpoint', async () => {
    await manager.setBreakpointOnMain();
    await manager.setExecCatchpoint();

    expect(backend.written).to.deep.equal(['-break-insert main', 'catch exec']);
  });
});
