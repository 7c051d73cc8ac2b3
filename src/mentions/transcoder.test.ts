/**
 * Unit tests for mention conversion in both directions.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { MentionTranscoder, applySpans } from './transcoder.js';
import { Resolver } from '../resolver/resolver.js';
import { ALICE, BOB, SERVER_B, StubGateway } from '../__fixtures__/gateway.js';

let gateway: StubGateway;
let transcoder: MentionTranscoder;

beforeEach(() => {
  gateway = new StubGateway();
  transcoder = new MentionTranscoder(gateway, new Resolver(gateway));
});

describe('applySpans', () => {
  it('swaps spans and keeps the text between them', () => {
    const spans = [
      { start: 0, end: 2, text: 'ab', replacement: 'X' },
      { start: 4, end: 5, text: 'e', replacement: 'YY' },
    ];
    expect(applySpans('abcdef', spans)).toBe('XcdYYf');
  });

  it('returns the text unchanged without spans', () => {
    expect(applySpans('abc', [])).toBe('abc');
  });
});

describe('humanize', () => {
  it('replaces mentions with usernames', async () => {
    expect(await transcoder.humanize('Deploy finished, thanks <@111111111111111111>'))
      .toBe('Deploy finished, thanks @alice');
  });

  it('understands the nickname form', async () => {
    expect(await transcoder.humanize('<@!222222222222222222> ping')).toBe('@bob ping');
  });

  it('falls back to the bracketed ID for unknown users', async () => {
    expect(await transcoder.humanize('hi <@444444444444444444>')).toBe('hi @[444444444444444444]');
  });

  it('fetches a repeated mention once', async () => {
    const text = '<@111111111111111111> and <@!111111111111111111>';
    expect(await transcoder.humanize(text)).toBe('@alice and @alice');
    expect(gateway.calls.fetchUser).toEqual([ALICE.id]);
  });

  it('leaves text without mentions alone', async () => {
    expect(await transcoder.humanize('plain text')).toBe('plain text');
    expect(gateway.calls.fetchUser).toEqual([]);
  });

  it('falls back when the gateway throws', async () => {
    vi.spyOn(gateway, 'fetchUser').mockRejectedValue(new Error('boom'));
    const logged = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(await transcoder.humanize('<@111111111111111111>')).toBe('@[111111111111111111]');
    expect(logged).toHaveBeenCalledWith('[mentions] Could not fetch user 111111111111111111: boom');
    logged.mockRestore();
  });
});

describe('encode', () => {
  it('turns a known username into a mention', async () => {
    expect(await transcoder.encode('hello @alice')).toBe('hello <@111111111111111111>');
  });

  it('keeps sentence punctuation outside the mention', async () => {
    expect(await transcoder.encode('thanks @alice.')).toBe('thanks <@111111111111111111>.');
  });

  it('matches display names and prefers the scoped server', async () => {
    expect(await transcoder.encode('@Caz and @bob', SERVER_B))
      .toBe('<@333333333333333333> and <@222222222222222222>');
  });

  it('wraps an @-prefixed ID without fetching it', async () => {
    expect(await transcoder.encode('@222222222222222222')).toBe('<@222222222222222222>');
    expect(gateway.calls.fetchUser).toEqual([]);
  });

  it('wraps a bare ID that belongs to a user', async () => {
    expect(await transcoder.encode(`ping ${BOB.id} please`)).toBe('ping <@222222222222222222> please');
  });

  it('leaves short numbers untouched', async () => {
    expect(await transcoder.encode('call 18005551234')).toBe('call 18005551234');
    expect(gateway.calls.fetchUser).toEqual([]);
  });

  it('leaves an ID-shaped number that is no user untouched', async () => {
    expect(await transcoder.encode('order 444444444444444444')).toBe('order 444444444444444444');
    expect(gateway.calls.fetchUser).toEqual(['444444444444444444']);
  });

  it('leaves unknown names as written', async () => {
    expect(await transcoder.encode('@nobody are you there')).toBe('@nobody are you there');
  });

  it('leaves a name as written when the gateway throws', async () => {
    await transcoder.encode('hi @alice');
    vi.spyOn(gateway, 'fetchUser').mockRejectedValue(new Error('boom'));
    const logged = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(await transcoder.encode('hi @alice and @bob')).toBe('hi @alice and <@222222222222222222>');
    expect(logged).toHaveBeenCalledWith('[mentions] Could not resolve @alice: boom');
    logged.mockRestore();
  });

  it('does not touch email addresses or existing markup', async () => {
    const text = 'mail alice@example.com or <@111111111111111111>';
    expect(await transcoder.encode(text)).toBe(text);
    expect(gateway.calls.fetchUser).toEqual([]);
  });
});
