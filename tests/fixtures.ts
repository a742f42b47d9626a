/** Shared request bodies for evaluation tests. */

export function validEvaluationBody(): Record<string, unknown> {
  return {
    chat_history: [{ role: 'user', content: 'Hello' }],
    exact_turn: 'Hello',
    thumbs: 'up',
    user_id: 'user_123',
    session_id: 'session_456',
    chat_id: 'chat_789',
    chat_created_at: '2025-11-12T10:30:00Z',
    thumbs_created_at: '2025-11-12T10:31:00Z',
  };
}
