import { describe, expect, it } from 'vitest';
import { TranscriptCleaner } from '../services/text/TranscriptCleaner';
import type { TranscriptionResult } from '../types';
import { TranscriptAssembler } from './TranscriptAssembler';

const ok = (seq: number, text: string): TranscriptionResult => ({
  sessionId: 1,
  generation: 0,
  seq,
  text,
  status: 'OK',
  attempts: 1
});

const failed = (seq: number): TranscriptionResult => ({
  sessionId: 1,
  generation: 0,
  seq,
  text: '',
  status: 'FAILED',
  attempts: 2,
  error: 'model crashed'
});

const createAssembler = (): TranscriptAssembler =>
  new TranscriptAssembler({ gapMarker: '[gap {seq}]' });

describe('TranscriptAssembler', () => {
  it('emits in seq order whatever the completion order', () => {
    const assembler = createAssembler();

    expect(assembler.accept(ok(2, 'three'))).toEqual([]);
    expect(assembler.accept(ok(1, 'two'))).toEqual([]);
    expect(assembler.heldCount()).toBe(2);

    const appended = assembler.accept(ok(0, 'one'));
    expect(appended.map((part) => part.seq)).toEqual([0, 1, 2]);
    expect(assembler.transcript()).toBe('one two three');
    expect(assembler.nextExpectedSeq()).toBe(3);
    expect(assembler.heldCount()).toBe(0);
  });

  it('renders failed chunks as a visible gap marker', () => {
    const assembler = createAssembler();
    assembler.accept(ok(0, 'before'));
    assembler.accept(failed(1));
    assembler.accept(ok(2, 'after'));

    expect(assembler.transcript()).toBe('before [gap 1] after');
    expect(assembler.failedCount()).toBe(1);
  });

  it('does not let a missing slot release later results', () => {
    const assembler = createAssembler();
    assembler.accept(ok(1, 'second'));

    expect(assembler.transcript()).toBe('');
    expect(assembler.appendedCount()).toBe(0);
  });

  it('ignores duplicates and results behind the cursor', () => {
    const assembler = createAssembler();
    assembler.accept(ok(0, 'first'));
    assembler.accept(ok(2, 'third'));

    expect(assembler.accept(ok(0, 'again'))).toEqual([]);
    expect(assembler.accept(ok(2, 'other'))).toEqual([]);

    assembler.accept(ok(1, 'second'));
    expect(assembler.transcript()).toBe('first second third');
  });

  it('skips empty parts when joining', () => {
    const assembler = createAssembler();
    assembler.accept(ok(0, '  hello '));
    assembler.accept(ok(1, ''));
    assembler.accept(ok(2, 'world'));

    expect(assembler.transcript()).toBe('hello world');
    expect(assembler.appendedCount()).toBe(3);
  });

  it('cleans each part before appending it', () => {
    const assembler = new TranscriptAssembler({
      gapMarker: '[gap {seq}]',
      cleaner: new TranscriptCleaner(['(?<!\\p{L})Σας\\s+ευχαριστώ(?!\\p{L})[^\\p{L}\\p{N}]*'])
    });
    assembler.accept(ok(0, 'Καλημέρα σε όλους. Σας ευχαριστώ.'));

    expect(assembler.transcript()).toBe('Καλημέρα σε όλους.');
  });

  it('starts over after clear', () => {
    const assembler = createAssembler();
    assembler.accept(ok(0, 'old'));
    assembler.accept(ok(3, 'held'));
    assembler.clear();

    assembler.accept(ok(0, 'new'));
    expect(assembler.transcript()).toBe('new');
    expect(assembler.heldCount()).toBe(0);
  });
});
