/**
 * Tests for SearchSession
 */

import { describe, it, expect } from '@jest/globals';
import { SearchSession } from './session.js';

// ============================================================================
// SearchSession
// ============================================================================

describe('SearchSession', () => {
  it('is filled once the target is reached and trims the excess', () => {
    const session = new SearchSession<null>(2, 1, 14);
    session.offer({ identity: 'a', payload: null });
    expect(session.isFilled()).toBe(false);

    session.offer({ identity: 'b', payload: null });
    session.offer({ identity: 'c', payload: null });
    expect(session.isFilled()).toBe(true);
    expect(session.resultsCount).toBe(3);

    session.trimToTarget();
    expect(session.resultsCount).toBe(2);
    expect(session.hasSeen('c')).toBe(true);
  });
});
