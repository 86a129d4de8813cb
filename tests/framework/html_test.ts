/**
 * HTML Utility Tests
 */

import { expect, test } from 'vitest';
import { SafeHtml, escape, html, raw } from '../../framework/view/html.ts';

test('SafeHtml - toString returns content', () => {
  expect(new SafeHtml('<span>Test</span>').toString()).toBe('<span>Test</span>');
});

test('escape - escapes each special character', () => {
  expect(escape('Tom & Jerry')).toBe('Tom &amp; Jerry');
  expect(escape('a < b > c')).toBe('a &lt; b &gt; c');
  expect(escape('say "hello"')).toBe('say &quot;hello&quot;');
  expect(escape("it's")).toBe('it&#39;s');
});

test('escape - does not escape SafeHtml', () => {
  expect(escape(raw('<b>bold</b>'))).toBe('<b>bold</b>');
});

test('escape - handles null, undefined and numbers', () => {
  expect(escape(null)).toBe('');
  expect(escape(undefined)).toBe('');
  expect(escape(42)).toBe('42');
});

test('html - escapes interpolated values', () => {
  const userInput = '<script>alert("xss")</script>';
  expect(html`<div>${userInput}</div>`.content).toBe(
    '<div>&lt;script&gt;alert(&quot;xss&quot;)&lt;/script&gt;</div>'
  );
});

test('html - keeps SafeHtml and nested html values', () => {
  const inner = html`<span>${'a&b'}</span>`;
  expect(html`<div>${inner}${raw('<br>')}</div>`.content).toBe('<div><span>a&amp;b</span><br></div>');
});

test('html - handles no interpolations', () => {
  const result = html`<p>plain</p>`;
  expect(result).toBeInstanceOf(SafeHtml);
  expect(result.content).toBe('<p>plain</p>');
});
