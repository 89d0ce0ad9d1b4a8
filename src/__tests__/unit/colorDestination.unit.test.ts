/**
 * Unit Tests — pino color destination
 *
 * Most cases feed JSON lines straight into write() so the input is exact;
 * the last block runs a real pino logger through the destination.
 */
import { ColorEncoder } from '@application/encoders/ColorEncoder';
import { noTime } from '@application/encoders/options';
import { Level } from '@domain/entities/Level';
import { BufferPool } from '@infrastructure/buffer/BufferPool';
import { createColorDestination, toLevel } from '@interfaces/pino/colorDestination';
import { ShortWriteError } from '@shared/errors/EncoderError';
import pino from 'pino';

import { FIXED_TIME, FIXED_TIME_RFC3339, TAGS, pad, paint } from '../helpers/fixtures';
import { MemorySink } from '../helpers/memorySink';

function line(record: Record<string, unknown>): string {
  return `${JSON.stringify(record)}\n`;
}

describe('toLevel()', () => {
  it.each([
    [10, Level.Debug],
    [20, Level.Debug],
    [30, Level.Info],
    [40, Level.Warn],
    [50, Level.Error],
    [60, Level.Fatal],
    [35, 35],
    ['warn', Level.Warn],
    ['verbose', Level.Info],
    [undefined, Level.Info],
  ])('should map %p to %p', (raw, level) => {
    expect(toLevel(raw)).toBe(level);
  });
});

describe('createColorDestination()', () => {
  let sink: MemorySink;

  beforeEach(() => {
    sink = new MemorySink();
  });

  it('should render a pino record with time, message and fields', () => {
    const dest = createColorDestination({ sink });

    dest.write(
      line({ level: 40, time: FIXED_TIME.getTime(), pid: 1, hostname: 'h', user: 'alice', msg: 'disk low' }),
    );

    expect(sink.text()).toBe(
      `${TAGS.warn} ${FIXED_TIME_RFC3339} ${pad('disk low')} ${paint('user', 7)}=alice\n`,
    );
  });

  it('should accept ISO time strings', () => {
    const dest = createColorDestination({ sink });

    dest.write(line({ level: 30, time: FIXED_TIME.toISOString(), msg: 'iso' }));

    expect(sink.text()).toBe(`${TAGS.info} ${FIXED_TIME_RFC3339} ${pad('iso')}\n`);
  });

  it('should nest plain objects as frames', () => {
    const dest = createColorDestination({ sink, textOptions: [noTime()] });

    dest.write(line({ level: 30, req: { id: 7, ok: true } }));

    expect(sink.text()).toBe(`${TAGS.info} ${paint('req', 7)}={${paint('id', 3)}=7 ${paint('ok', 2)}=true}\n`);
  });

  it('should render floats as floats and arrays via stringification', () => {
    const dest = createColorDestination({ sink, textOptions: [noTime()] });

    dest.write(line({ level: 50, ratio: 0.25, tags: ['a', 'b'] }));

    expect(sink.text()).toBe(`${TAGS.error} ${paint('ratio', 5)}=0.25 ${paint('tags', 5)}=[ 'a', 'b' ]\n`);
  });

  it('should pass unknown numeric levels through as numbers', () => {
    const dest = createColorDestination({ sink, textOptions: [noTime()] });

    dest.write(line({ level: 35, msg: 'custom' }));

    expect(sink.text()).toBe(`35 ${pad('custom')}\n`);
  });

  it('should keep pid when the ignore list is overridden', () => {
    const dest = createColorDestination({ sink, textOptions: [noTime()], ignore: [] });

    dest.write(line({ level: 30, pid: 42 }));

    expect(sink.text()).toBe(`${TAGS.info} ${paint('pid', 3)}=42\n`);
  });

  it('should write lines that are not JSON objects through unchanged', () => {
    const dest = createColorDestination({ sink });

    dest.write('plain text\n');
    dest.write('[1,2]\n');

    expect(sink.writes).toEqual(['plain text\n', '[1,2]\n']);
  });

  it('should use the supplied encoder source and free every encoder', () => {
    const pool = new BufferPool();
    const created: string[] = [];
    const dest = createColorDestination({
      sink,
      encoders: {
        create: () => {
          created.push('enc');
          return new ColorEncoder([noTime()], pool);
        },
      },
    });

    dest.write(line({ level: 30, msg: 'a' }));
    dest.write(line({ level: 30, msg: 'b' }));

    expect(created).toEqual(['enc', 'enc']);
    expect(pool.stats()).toEqual({ allocated: 2, reused: 2, released: 4, idle: 2 });
    expect(sink.writes).toEqual([`${TAGS.info} ${pad('a')}\n`, `${TAGS.info} ${pad('b')}\n`]);
  });

  it('should hand write errors to onError', () => {
    const onError = jest.fn();
    const dest = createColorDestination({ sink: new MemorySink(1), textOptions: [noTime()], onError });

    dest.write(line({ level: 30, msg: 'x' }));

    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0][0]).toBeInstanceOf(ShortWriteError);
  });

  it('should rethrow write errors by default', () => {
    const dest = createColorDestination({ sink: new MemorySink(1), textOptions: [noTime()] });

    expect(() => dest.write(line({ level: 30, msg: 'x' }))).toThrow(ShortWriteError);
  });

  describe('with a pino logger', () => {
    it('should render logger calls, bindings included', () => {
      const logger = pino(
        { base: null, timestamp: false },
        createColorDestination({ sink, textOptions: [noTime()] }),
      );

      logger.child({ user: 'alice' }).info({ n: 3 }, 'login');

      expect(sink.text()).toBe(`${TAGS.info} ${pad('login')} ${paint('user', 7)}=alice ${paint('n', 6)}=3\n`);
    });

    it('should respect the logger level', () => {
      const logger = pino(
        { base: null, timestamp: false, level: 'warn' },
        createColorDestination({ sink, textOptions: [noTime()] }),
      );

      logger.info('hidden');
      logger.error('shown');

      expect(sink.text()).toBe(`${TAGS.error} ${pad('shown')}\n`);
    });
  });
});
