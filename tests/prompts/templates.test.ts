import { describe, it, expect } from 'vitest';
import { INSIGHT_PROMPT, render } from '../../src/prompts/templates.js';

describe('render', () => {
  it('should substitute every known placeholder', () => {
    expect(render('{greeting}, {name}!', { greeting: 'Hello', name: 'team' })).toBe('Hello, team!');
  });

  it('should leave unknown placeholders untouched', () => {
    expect(render('{known} {unknown}', { known: 'x' })).toBe('x {unknown}');
  });

  it('should insert values verbatim', () => {
    expect(render('[{text}]', { text: 'costs $& and {text}' })).toBe('[costs $& and {text}]');
  });

  it('should fill the insight prompt', () => {
    const prompt = render(INSIGHT_PROMPT, { text: 'Lid leaks', source: 'web', category: 'kitchen' });

    expect(prompt).toContain('Customer Text: """Lid leaks"""');
    expect(prompt).toContain('Source: web');
    expect(prompt).toContain('Category: kitchen');
    expect(prompt).not.toContain('{text}');
  });
});
