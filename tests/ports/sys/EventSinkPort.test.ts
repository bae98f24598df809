import type { EventSinkPort } from '../../../src/ports/sys/EventSinkPort';
import { TimeReporter } from '../../../src/domain/timeReport/TimeReporter';
import { ManualClock, MS } from '../../helpers/fakes';

describe('EventSinkPort contract', () => {
  test('a reporter passes scope, target, level and message in that order', () => {
    const calls: unknown[][] = [];
    const sink: EventSinkPort = {
      emit: (...args) => {
        calls.push(args);
      },
    };
    const clock = new ManualClock();
    const reporter = new TimeReporter('contract', { sink, clock, level: 'trace', precision: 1, width: 0 });
    reporter.start('k');
    clock.advance(100n * MS);
    reporter.finish();

    expect(calls).toEqual([['time-report', 'tracing-perf', 'trace', 'name: contract, k: 0.1']]);
  });
});
