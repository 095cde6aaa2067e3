import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { parseDelimited, parseJsonResponse, stripMarkdown } from './responseParser.js';

describe('stripMarkdown', () => {
  it('removes heading and emphasis markers', () => {
    expect(stripMarkdown('## **Mwaramutse**')).toBe('Mwaramutse');
  });
});

describe('parseDelimited', () => {
  it('splits and trims pipe separated fields', () => {
    const result = parseDelimited('**Mwaramutse** | Good morning');
    expect(result).toEqual({ ok: true, value: ['Mwaramutse', 'Good morning'] });
  });

  it('keeps an optional third field', () => {
    const result = parseDelimited("Akabando k'iminsi gacibwa kare|A walking stick for old age is prepared in advance|Prepare early.");
    expect(result.ok && result.value[2]).toBe('Prepare early.');
  });

  it('rejects a reply with a single field', () => {
    const result = parseDelimited('Sorry, I cannot help with that.');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('malformed');
      expect(result.error.raw).toBe('Sorry, I cannot help with that.');
    }
  });

  it('rejects empty required fields', () => {
    expect(parseDelimited('Mwaramutse|  ').ok).toBe(false);
  });

  it('honours a higher minimum', () => {
    expect(parseDelimited('a|b', 3).ok).toBe(false);
    expect(parseDelimited('a|b|c', 3).ok).toBe(true);
  });
});

describe('parseJsonResponse', () => {
  const verdict = z.object({ is_correct: z.boolean(), feedback: z.string() });

  it('reads JSON wrapped in a code fence', () => {
    const result = parseJsonResponse('```json\n{"is_correct": true, "feedback": "Well done"}\n```', verdict);
    expect(result).toEqual({ ok: true, value: { is_correct: true, feedback: 'Well done' } });
  });

  it('reports invalid JSON as malformed', () => {
    const result = parseJsonResponse('{"is_correct": tru}', verdict);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message.startsWith('Invalid JSON')).toBe(true);
    }
  });

  it('reports a missing object', () => {
    const result = parseJsonResponse('Correct', verdict);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('No JSON object in response');
    }
  });

  it('reports the wrong shape', () => {
    const result = parseJsonResponse('{"is_correct": "yes"}', verdict);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message.startsWith('Unexpected JSON shape')).toBe(true);
    }
  });
});
