import {
  context,
  SpanKind,
  SpanStatusCode,
  trace,
  type Attributes,
  type Context,
  type Span,
  type TextMapGetter,
  type TextMapPropagator,
  type TextMapSetter,
  type Tracer,
} from '@opentelemetry/api';
import { W3CTraceContextPropagator } from '@opentelemetry/core';
import type { ConsumerRecord } from '../../domain/entities/Record.js';
import type { RecordHeaders } from '../../domain/entities/RecordHeaders.js';
import type { IRecordTracer, TraceScope } from '../../domain/ports/IRecordTracer.js';

/** Register this name with the OpenTelemetry SDK to collect client spans */
export const TRACER_NAME = 'brokerlink';
export const TRACER_VERSION = '0.1.0';
export const MESSAGING_SYSTEM = 'brokerlink';

type MessagingOperation = 'produce' | 'consume' | 'process';

const headerSetter: TextMapSetter<RecordHeaders> = {
  set(carrier, key, value) {
    carrier.add(key, value);
  },
};

const headerGetter: TextMapGetter<RecordHeaders> = {
  keys(carrier) {
    return Array.from(carrier, ([key]) => key);
  },
  get(carrier, key) {
    return carrier.getString(key);
  },
};

function messagingAttributes(topic: string, operation: MessagingOperation): Attributes {
  return {
    'messaging.system': MESSAGING_SYSTEM,
    'messaging.destination.name': topic,
    'messaging.operation': operation,
  };
}

class SpanScope implements TraceScope {
  constructor(private readonly span: Span) {}

  setAttribute(key: string, value: string | number): void {
    this.span.setAttribute(key, value);
  }

  recordError(error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    if (error instanceof Error) {
      this.span.recordException(error);
    }
    this.span.setStatus({ code: SpanStatusCode.ERROR, message });
  }

  end(): void {
    this.span.end();
  }
}

/**
 * IRecordTracer over @opentelemetry/api.
 *
 * Spans follow the messaging semantic conventions ("<topic> produce" etc.).
 * Trace context travels in W3C traceparent/tracestate record headers. Without
 * a registered SDK the global tracer is a no-op and nothing is injected.
 */
export class OpenTelemetryRecordTracer implements IRecordTracer {
  constructor(
    private readonly tracer: Tracer = trace.getTracer(TRACER_NAME, TRACER_VERSION),
    private readonly propagator: TextMapPropagator = new W3CTraceContextPropagator()
  ) {}

  startProduce(topic: string, headers: RecordHeaders): TraceScope {
    const parent = context.active();
    const span = this.tracer.startSpan(
      `${topic} produce`,
      { kind: SpanKind.PRODUCER, attributes: messagingAttributes(topic, 'produce') },
      parent
    );
    this.inject(headers, trace.setSpan(parent, span));
    return new SpanScope(span);
  }

  startConsume(topic: string): TraceScope {
    const span = this.tracer.startSpan(
      `${topic} consume`,
      { kind: SpanKind.CONSUMER, attributes: messagingAttributes(topic, 'consume') },
      context.active()
    );
    return new SpanScope(span);
  }

  startProcess(record: ConsumerRecord): TraceScope {
    const span = this.tracer.startSpan(
      `${record.topic} process`,
      {
        kind: SpanKind.CONSUMER,
        attributes: {
          ...messagingAttributes(record.topic, 'process'),
          'messaging.destination.partition.id': String(record.partition),
          'messaging.message.id': String(record.offset),
        },
      },
      this.extract(record.headers)
    );
    return new SpanScope(span);
  }

  inject(headers: RecordHeaders, ctx: Context = context.active()): void {
    this.propagator.inject(ctx, headers, headerSetter);
  }

  /**
   * Context carried by the headers on top of the active one; unchanged when
   * there is no valid traceparent
   */
  extract(headers: RecordHeaders, ctx: Context = context.active()): Context {
    return this.propagator.extract(ctx, headers, headerGetter);
  }
}
