import { EventBusSink } from '../../../src/adapters/sys/EventBusSink';
import { SimpleEventBus } from '../../../src/adapters/sys/SimpleEventBus';
import { Topics } from '../../../src/domain/events/EventBus';
import type { TimeReportEvent } from '../../../src/domain/timeReport/TimeReportEvent';

describe('EventBusSink', () => {
  test('publishes each emission as a TimeReportEmitted event', () => {
    const bus = new SimpleEventBus();
    const handler = jest.fn<void, [TimeReportEvent]>();
    bus.subscribe(Topics.TimeReportEmitted, handler);

    new EventBusSink(bus).emit('time-report', 'tracing-perf', 'error', 'name: x');

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith({
      scope: 'time-report',
      target: 'tracing-perf',
      level: 'error',
      message: 'name: x',
    });
  });

  test('emitting with no subscribers is a no-op', () => {
    const bus = new SimpleEventBus();
    expect(() => new EventBusSink(bus).emit('s', 't', 'info', 'm')).not.toThrow();
  });
});
