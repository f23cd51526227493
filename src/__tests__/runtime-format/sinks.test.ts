/**
 * Unit tests for output sinks.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { closeSync, mkdtempSync, openSync, readFileSync, rmSync } from 'node:fs';
import { constants as bufferConstants } from 'node:buffer';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  BoundedSink,
  CallbackSink,
  FileDescriptorSink,
  SinkError,
  SinkOverflowError,
  StringSink,
  render,
} from '../../runtime-format/index.js';

describe('StringSink', () => {
  it('should accumulate chunks in order', () => {
    const sink = new StringSink();
    sink.write('ab');
    sink.write('');
    sink.write('cd');
    expect(sink.toString()).toBe('abcd');
    expect(sink.length).toBe(4);
  });

  it('should default its cap to the engine string limit', () => {
    expect(new StringSink().maxLength).toBe(bufferConstants.MAX_STRING_LENGTH);
  });

  it('should reject the write that passes its cap and keep prior content', () => {
    // Given: a sink capped at three code units holding two
    const sink = new StringSink(3);
    sink.write('ab');

    // When: a write would take it to four
    const run = () => sink.write('cd');

    // Then: the write is refused whole
    expect(run).toThrow(SinkOverflowError);
    expect(sink.toString()).toBe('ab');
    expect(sink.length).toBe(2);
  });

  it('should reset on clear', () => {
    const sink = new StringSink();
    sink.write('x');
    sink.clear();
    expect(sink.toString()).toBe('');
    expect(sink.length).toBe(0);
  });
});

describe('BoundedSink', () => {
  it('should accept writes up to its capacity', () => {
    const sink = new BoundedSink(4);
    sink.write('ab');
    sink.write('cd');
    expect(sink.toString()).toBe('abcd');
    expect(sink.remaining).toBe(0);
  });

  it('should reject the write that overflows and keep prior content', () => {
    const sink = new BoundedSink(3);
    sink.write('ab');
    expect(() => sink.write('cd')).toThrow(SinkOverflowError);
    expect(sink.toString()).toBe('ab');
    expect(sink.length).toBe(2);
  });

  it('should report capacity and attempted size on overflow', () => {
    const sink = new BoundedSink(2);
    let caught: unknown;
    try {
      sink.write('abc');
    } catch (err: unknown) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(SinkError);
    expect(caught instanceof SinkOverflowError ? [caught.capacity, caught.attempted] : []).toEqual([2, 3]);
    expect(caught instanceof Error ? caught.message : '').toBe('Sink capacity exceeded: 3 > 2');
  });

  it('should reject an invalid capacity', () => {
    expect(() => new BoundedSink(-1)).toThrow(RangeError);
    expect(() => new BoundedSink(1.5)).toThrow(RangeError);
  });

  it('should hold a full render that fits', () => {
    const sink = new BoundedSink(128);
    render('{}{}{}', [1, 2, 3], sink);
    expect(sink.toString()).toBe('123');
  });
});

describe('CallbackSink', () => {
  it('should forward each chunk', () => {
    const chunks: string[] = [];
    const sink = new CallbackSink((chunk) => chunks.push(chunk));
    sink.write('a');
    sink.write('b');
    expect(chunks).toEqual(['a', 'b']);
  });
});

describe('FileDescriptorSink', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'runfmt-sink-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should write rendered output to the file', () => {
    // Given: an open file descriptor
    const filePath = join(dir, 'out.txt');
    const fd = openSync(filePath, 'w');

    // When: a template is rendered into it
    try {
      render('{}: {:03}\n', ['count', 7], new FileDescriptorSink(fd));
    } finally {
      closeSync(fd);
    }

    // Then: the file holds the rendered text
    expect(readFileSync(filePath, 'utf-8')).toBe('count: 007\n');
  });

  it('should surface I/O failures as SinkError', () => {
    const sink = new FileDescriptorSink(-1);
    expect(() => sink.write('x')).toThrow(SinkError);
  });
});
