import { ArgumentsHost, ForbiddenException, NotFoundException } from '@nestjs/common';
import { z } from 'zod';
import { ApiExceptionFilter, toErrorEnvelope } from './api-exception.filter';

function makeHost(requestId: string | undefined) {
  const res = {
    getHeader: jest.fn((name: string) => (name === 'x-request-id' ? requestId : undefined)),
    status: jest.fn(),
    json: jest.fn(),
  };
  res.status.mockReturnValue(res);
  res.json.mockReturnValue(res);
  const host = {
    switchToHttp: () => ({ getResponse: () => res, getRequest: () => ({}) }),
  } as unknown as ArgumentsHost;
  return { host, res };
}

describe('toErrorEnvelope', () => {
  it('maps Nest http exceptions to their status and message', () => {
    expect(toErrorEnvelope(new NotFoundException('Post not found'))).toEqual({
      meta: { status: 404, errors: [{ code: 404, message: 'Post not found', reason: 'Not Found' }] },
    });
    expect(toErrorEnvelope(new ForbiddenException('Invalid PIN')).meta.status).toBe(403);
  });

  it('maps zod issues to one 400 error each', () => {
    const schema = z.object({ score: z.coerce.number().int('Score must be an integer') });
    const result = schema.safeParse({ score: '7.5' });
    if (result.success) throw new Error('expected a validation failure');

    expect(toErrorEnvelope(result.error)).toEqual({
      meta: { status: 400, errors: [{ code: 400, message: 'Score must be an integer', reason: 'score' }] },
    });
  });

  it('hides unknown errors behind a generic 500', () => {
    expect(toErrorEnvelope(new Error('SQLITE_BUSY'))).toEqual({
      meta: {
        status: 500,
        errors: [{ code: 500, message: 'Internal server error', reason: 'internal_error' }],
      },
    });
  });
});

describe('ApiExceptionFilter', () => {
  it('writes the envelope with the request id', () => {
    const { host, res } = makeHost('rid-1');
    new ApiExceptionFilter().catch(new NotFoundException('Post not found'), host);

    expect(res.status).toHaveBeenCalledWith(404);
    expect(res.json).toHaveBeenCalledWith({
      meta: {
        status: 404,
        errors: [{ code: 404, message: 'Post not found', reason: 'Not Found' }],
        requestId: 'rid-1',
      },
    });
  });

  it('omits the request id when none was assigned', () => {
    const { host, res } = makeHost(undefined);
    new ApiExceptionFilter().catch(new ForbiddenException('Invalid PIN'), host);

    expect(res.status).toHaveBeenCalledWith(403);
    expect(res.json).toHaveBeenCalledWith({
      meta: { status: 403, errors: [{ code: 403, message: 'Invalid PIN', reason: 'Forbidden' }] },
    });
  });
});
