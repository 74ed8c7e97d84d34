import { randomUUID } from 'node:crypto';
import type { Session, UserProfile } from '../types';

export function newSessionId(now: Date = new Date()): string {
  // Time-ordered prefix, random suffix so two sessions in the same millisecond stay distinct
  return `session_${now.getTime()}_${randomUUID().slice(0, 8)}`;
}

export function createSession(userProfile: UserProfile, now: Date = new Date()): Session {
  return {
    sessionId: newSessionId(now),
    userProfile,
    decisionDna: undefined,
    scenarios: [],
    conversationHistory: [],
    createdAt: now.toISOString()
  };
}
