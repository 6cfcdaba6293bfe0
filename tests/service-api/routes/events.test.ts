import { describe, it, expect } from 'vitest';
import { eventsRouter } from '@api/routes/events';
import { makeContext, routePaths } from '../helpers';

describe('events router', () => {
  it('registers /stats ahead of /:seq', () => {
    expect(routePaths(eventsRouter(makeContext()))).toEqual(['/', '/stats', '/:seq']);
  });
});
