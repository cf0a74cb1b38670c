import { describe, it, expect } from 'vitest';
import { jsonBufferSerializer, jsonStringSerializer, createJsonSerializer } from '../serialization/json-serializer.js';
import { SerializationError } from '../errors.js';
import { MetricKind, type Histogram, type MetricSnapshot } from '../metrics/types.js';
import { TimeUnit } from '../metrics/time-unit.js';
import {
  REPORT_TIME,
  REPORT_TIMESTAMP,
  SAMPLE_DISTRIBUTION,
  SAMPLE_RATES,
  SAMPLE_TIMINGS,
  counter,
  gauge,
  histogram,
  meter,
  timer,
} from './helpers/metric-fixtures.js';

function serializeToStrings(snapshot: MetricSnapshot) {
  return jsonStringSerializer.serialize(snapshot, 'metrics', REPORT_TIME, TimeUnit.SECONDS, TimeUnit.MILLISECONDS);
}

function mixedSnapshot(): MetricSnapshot {
  return {
    gauges: new Map([
      ['queue.size', gauge(12)],
      ['app.random', gauge(42)],
    ]),
    counters: { 'requests.total': counter(7) },
    histograms: { 'payload.bytes': histogram(10, SAMPLE_DISTRIBUTION) },
    meters: new Map([
      ['logins', meter(3, SAMPLE_RATES)],
      ['errors', meter(1, SAMPLE_RATES)],
    ]),
    timers: { 'db.query': timer(5, SAMPLE_RATES, SAMPLE_TIMINGS) },
  };
}

describe('jsonStringSerializer', () => {
  it('produces the documented message for a single gauge', () => {
    const messages = serializeToStrings({ gauges: { 'app.random': gauge(42) } });

    expect(messages).toEqual([
      {
        topic: 'metrics',
        key: 'app.random',
        value: '{"value":42,"timestamp":"2015-10-22T11:50:34.762+00:00"}',
      },
    ]);
  });

  it('orders messages by kind, then by name', () => {
    const keys = serializeToStrings(mixedSnapshot()).map(message => message.key);

    expect(keys).toEqual([
      'app.random',
      'queue.size',
      'requests.total',
      'payload.bytes',
      'errors',
      'logins',
      'db.query',
    ]);
  });

  it('compares names by code unit', () => {
    const keys = serializeToStrings({
      counters: { b: counter(1), B: counter(1), a: counter(1), 'a.b': counter(1) },
    }).map(message => message.key);

    expect(keys).toEqual(['B', 'a', 'a.b', 'b']);
  });

  it('stamps every message of a cycle with the same timestamp', () => {
    const timestamps = serializeToStrings(mixedSnapshot()).map(message => JSON.parse(message.value).timestamp);

    expect(timestamps).toHaveLength(7);
    expect(new Set(timestamps)).toEqual(new Set([REPORT_TIMESTAMP]));
  });

  it('writes the native fields of each kind followed by the timestamp', () => {
    const fieldsByKey = new Map(
      serializeToStrings(mixedSnapshot()).map(message => [message.key, Object.keys(JSON.parse(message.value))])
    );

    expect(fieldsByKey.get('app.random')).toEqual(['value', 'timestamp']);
    expect(fieldsByKey.get('requests.total')).toEqual(['count', 'timestamp']);
    expect(fieldsByKey.get('payload.bytes')).toEqual([
      'count',
      'min',
      'max',
      'mean',
      'stddev',
      'p50',
      'p75',
      'p95',
      'p98',
      'p99',
      'p999',
      'timestamp',
    ]);
    expect(fieldsByKey.get('logins')).toEqual(['count', 'rate_1m', 'rate_5m', 'rate_15m', 'rate_mean', 'unit', 'timestamp']);
    expect(fieldsByKey.get('db.query')?.at(-1)).toBe('timestamp');
    expect(fieldsByKey.get('db.query')).toHaveLength(17);
  });

  it('emits a timestamp-only document for a gauge without a value', () => {
    const [message] = serializeToStrings({ gauges: { idle: gauge(undefined) } });

    expect(message.value).toBe('{"timestamp":"2015-10-22T11:50:34.762+00:00"}');
  });

  it('applies the configured units', () => {
    const [message] = jsonStringSerializer.serialize(
      { timers: { 'db.query': timer(5, SAMPLE_RATES, SAMPLE_TIMINGS) } },
      'metrics',
      REPORT_TIME,
      TimeUnit.MINUTES,
      TimeUnit.MICROSECONDS
    );
    const body = JSON.parse(message.value);

    expect(body.min).toBe(1000);
    expect(body.p50).toBe(4000);
    expect(body.rate_1m).toBe(30);
    expect(body.unit).toBe('calls/minute');
  });

  it('returns nothing for an empty snapshot', () => {
    expect(serializeToStrings({})).toEqual([]);
    expect(serializeToStrings({ gauges: new Map(), timers: {} })).toEqual([]);
  });

  it('uses the given topic for every message', () => {
    const messages = jsonStringSerializer.serialize(
      mixedSnapshot(),
      'ops.metrics',
      REPORT_TIME,
      TimeUnit.SECONDS,
      TimeUnit.MILLISECONDS
    );

    expect(messages.every(message => message.topic === 'ops.metrics')).toBe(true);
  });

  describe('failures', () => {
    const broken: Histogram = {
      getCount: () => 2,
      getSnapshot: () => {
        throw new Error('reservoir unavailable');
      },
    };

    it('fails the whole snapshot when one metric cannot be encoded', () => {
      const snapshot: MetricSnapshot = {
        gauges: { 'app.random': gauge(42) },
        histograms: { 'payload.bytes': broken },
        timers: { 'db.query': timer(5, SAMPLE_RATES, SAMPLE_TIMINGS) },
      };

      let caught: unknown;
      let result: unknown;
      try {
        result = serializeToStrings(snapshot);
      } catch (error) {
        caught = error;
      }

      expect(result).toBeUndefined();
      expect(caught).toBeInstanceOf(SerializationError);
      if (caught instanceof SerializationError) {
        expect(caught.metricName).toBe('payload.bytes');
        expect(caught.metricKind).toBe(MetricKind.HISTOGRAM);
        expect(caught.code).toBe('SERIALIZATION_FAILED');
        expect(caught.message).toBe('Failed to serialize histogram "payload.bytes": reservoir unavailable');
      }
    });

    it('rejects a metric with an empty name', () => {
      expect(() => serializeToStrings({ counters: { '': counter(1) } })).toThrow(SerializationError);
    });

    it('rejects a gauge value that cannot be written as JSON', () => {
      expect(() => serializeToStrings({ gauges: { big: gauge(1n) } })).toThrow(
        'Failed to serialize gauge "big": gauge value of type bigint cannot be encoded as JSON'
      );
    });
  });
});

describe('jsonBufferSerializer', () => {
  it('carries the UTF-8 bytes of the string variant', () => {
    const snapshot = mixedSnapshot();
    snapshot.gauges = { 'température.°C': gauge('chaud') };

    const asStrings = serializeToStrings(snapshot);
    const asBytes = jsonBufferSerializer.serialize(snapshot, 'metrics', REPORT_TIME, TimeUnit.SECONDS, TimeUnit.MILLISECONDS);

    expect(asBytes).toHaveLength(asStrings.length);
    asBytes.forEach((message, index) => {
      expect(Buffer.isBuffer(message.key)).toBe(true);
      expect(message.topic).toBe(asStrings[index].topic);
      expect(message.key.equals(Buffer.from(asStrings[index].key, 'utf8'))).toBe(true);
      expect(message.value.equals(Buffer.from(asStrings[index].value, 'utf8'))).toBe(true);
    });
  });

  it('is named after its payload type', () => {
    expect(jsonBufferSerializer.name).toBe('json-bytes');
    expect(jsonStringSerializer.name).toBe('json-string');
  });
});

describe('createJsonSerializer', () => {
  it('applies the record encoder to both key and value', () => {
    const upper = createJsonSerializer('upper', text => text.toUpperCase());
    const [message] = upper.serialize(
      { counters: { hits: counter(2) } },
      'metrics',
      REPORT_TIME,
      TimeUnit.SECONDS,
      TimeUnit.MILLISECONDS
    );

    expect(message).toEqual({
      topic: 'metrics',
      key: 'HITS',
      value: '{"COUNT":2,"TIMESTAMP":"2015-10-22T11:50:34.762+00:00"}',
    });
  });
});
