import { describe, it, expect } from '@jest/globals';
import { ModelRegistry } from '../context/models.js';
import { TokenEstimator } from '../context/token-estimator.js';
import { HistoryTruncator } from '../context/truncator.js';
import { documentInstructions } from '../document/format-detect.js';
import { ConversationService } from './service.js';
import { InMemoryConversationStore } from './store.js';

const registry = new ModelRegistry([
  { name: 'test-chat', contextWindow: 100, countingStrategy: 'heuristic', kind: 'chat' },
]);
const truncator = new HistoryTruncator(new TokenEstimator({ registry }));

const forty = (c: string) => c.repeat(40);

function setup() {
  const store = new InMemoryConversationStore({ systemPrompts: { chat: forty('s') } });
  return { store, service: new ConversationService(store, { truncator }) };
}

describe('ConversationService', () => {
  it('appends document instructions when a format is asked for', async () => {
    const { service } = setup();
    const message = 'Put the quarterly figures in a PDF';
    const prepared = await service.prepareRequest(1, 'chat', message, { model: 'test-chat' });

    expect(prepared.format).toBe('pdf');
    expect(prepared.userContent).toBe(`${message}\n\n${documentInstructions('pdf')}`);
  });

  it('sends plain text when no format is asked for or detection is off', async () => {
    const { service } = setup();
    const plain = await service.prepareRequest(1, 'chat', 'hello', { model: 'test-chat' });
    expect(plain.format).toBeUndefined();
    expect(plain.userContent).toBe('hello');
    expect(plain.turns).toEqual([
      { role: 'system', content: forty('s') },
      { role: 'user', content: 'hello' },
    ]);

    const forced = await service.prepareRequest(1, 'chat', 'a pdf please', { model: 'test-chat', format: null });
    expect(forced.format).toBeUndefined();
    expect(forced.userContent).toBe('a pdf please');
  });

  it('uses an explicit format over detection', async () => {
    const { service } = setup();
    const prepared = await service.prepareRequest(1, 'chat', 'a pdf please', { model: 'test-chat', format: 'rtf' });
    expect(prepared.format).toBe('rtf');
  });

  it('truncates the stored context around the new message', async () => {
    const { service } = setup();
    await service.recordExchange(1, 'chat', forty('a'), forty('b'));

    // system 17 + user 17 + assistant 18 + new user 17 against 50 available
    const prepared = await service.prepareRequest(1, 'chat', forty('c'), { model: 'test-chat', reserveTokens: 50 });
    expect(prepared.turns).toEqual([
      { role: 'system', content: forty('s') },
      { role: 'user', content: forty('c') },
    ]);
    expect(prepared.report.droppedTurns).toBe(2);
    expect(prepared.report.exhausted).toBe(false);
  });

  it('reports an exhausted budget', async () => {
    const { service } = setup();
    const prepared = await service.prepareRequest(1, 'chat', 'hi', { model: 'test-chat', reserveTokens: 90 });
    expect(prepared.turns).toEqual([]);
    expect(prepared.report.exhausted).toBe(true);
  });

  it('records the exchange as a pair and resets', async () => {
    const { store, service } = setup();
    await service.recordExchange(5, 'chat', 'question', 'answer');
    expect(await store.get(5, 'chat')).toEqual([
      { role: 'system', content: forty('s') },
      { role: 'user', content: 'question' },
      { role: 'assistant', content: 'answer' },
    ]);

    await service.reset(5, 'chat');
    expect(await store.get(5, 'chat')).toEqual([{ role: 'system', content: forty('s') }]);
  });
});
