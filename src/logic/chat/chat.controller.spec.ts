import { EventEmitter } from 'events';
import { ServiceUnavailableException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { AuthUser, ChatRequest, ChatResponse, Role } from '../../utils/types';
import { ChatController } from './chat.controller';
import { ChatService } from './chat.service';
import { GENERATION_UNAVAILABLE_MESSAGE } from './prompt';

class FakeResponse extends EventEmitter {
  writableEnded = false;
}

const user: AuthUser = { userId: 'u-1', username: 'fred', role: Role.FINANCE };

function response(status: ChatResponse['status'], answer: string): ChatResponse {
  return { status, answer, sources: [], userRole: Role.FINANCE, timestamp: '2024-01-01T00:00:00.000Z', queryProcessed: 'revenue' };
}

describe('ChatController', () => {
  let controller: ChatController;
  const chat = jest.fn<Promise<ChatResponse>, [ChatRequest, AbortSignal | undefined]>();
  const history = jest.fn();
  const clearMemory = jest.fn();

  beforeEach(async () => {
    chat.mockReset();
    const module: TestingModule = await Test.createTestingModule({
      controllers: [ChatController],
      providers: [{ provide: ChatService, useValue: { chat, history, clearMemory } }],
    }).compile();

    controller = module.get<ChatController>(ChatController);
  });

  it('passes the caller identity and hint through', async () => {
    chat.mockResolvedValue(response('answered', 'Revenue was 10M.'));
    const res = new FakeResponse();

    await expect(controller.chat({ user }, { query: 'revenue', priorTurnsHint: 2 }, res)).resolves.toEqual(
      response('answered', 'Revenue was 10M.'),
    );
    expect(chat.mock.calls[0][0]).toEqual({ userId: 'u-1', role: Role.FINANCE, query: 'revenue', priorTurnsHint: 2 });
    expect(res.listenerCount('close')).toBe(0);
  });

  it('answers 503 when generation is unavailable', async () => {
    chat.mockResolvedValue(response('failed', GENERATION_UNAVAILABLE_MESSAGE));

    await expect(controller.chat({ user }, { query: 'revenue' }, new FakeResponse())).rejects.toThrow(
      new ServiceUnavailableException(GENERATION_UNAVAILABLE_MESSAGE),
    );
  });

  it('aborts the query when the client disconnects', async () => {
    chat.mockImplementation(
      (_request, signal) =>
        new Promise(resolve => {
          signal?.addEventListener('abort', () => resolve(response('failed', GENERATION_UNAVAILABLE_MESSAGE)));
        }),
    );
    const res = new FakeResponse();

    const pending = controller.chat({ user }, { query: 'revenue' }, res);
    res.emit('close');

    await expect(pending).rejects.toBeInstanceOf(ServiceUnavailableException);
    expect(chat.mock.calls[0][1]?.aborted).toBe(true);
  });

  it('reports whether there was memory to clear', async () => {
    clearMemory.mockResolvedValue(false);
    await expect(controller.clearMemory({ user })).resolves.toEqual({ message: 'No conversation memory to clear' });
    expect(clearMemory).toHaveBeenCalledWith('u-1');
  });

  it('returns the stored turns', async () => {
    history.mockResolvedValue([]);
    await expect(controller.history({ user })).resolves.toEqual({ turns: [] });
  });
});
