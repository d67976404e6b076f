import { describe, expect, it } from 'vitest';
import { cleanMessage } from '../middleware/sanitize.js';

describe('cleanMessage', () => {
  it('drops scripts and tags but keeps their surrounding text', () => {
    expect(cleanMessage('x<script>bad()</script>y')).toBe('xy');
    expect(cleanMessage('<p>Hello <b>world</b></p>')).toBe('Hello world');
  });

  it('turns code markup into backticks', () => {
    expect(cleanMessage('Use <code>SELECT 1</code> here')).toBe('Use `SELECT 1` here');
  });

  it('normalizes line endings and collapses blank runs', () => {
    expect(cleanMessage('a  \r\n\r\n\r\n\r\nb')).toBe('a\n\nb');
    expect(cleanMessage('one\rtwo')).toBe('one\ntwo');
  });

  it('replaces non-breaking spaces and trims the result', () => {
    expect(cleanMessage('\u00a0cash\u00a0rate\u00a0 ')).toBe('cash rate');
  });
});
