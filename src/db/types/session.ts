import type { CharacterState } from './fact.js';
import { createEmptyCharacterState } from './fact.js';
import type { MemorySnapshot } from './memory.js';
import { createEmptyMemorySnapshot } from './memory.js';
import type { SymbolicState } from './symbolic.js';
import { createInitialSymbolicState } from './symbolic.js';

// One persisted record per campaign session
export interface CampaignSession {
  id: string;
  name: string;
  turnNo: number; // bumped on every state-changing call, used as write version
  configVersion: string;
  character: CharacterState;
  symbolic: SymbolicState;
  memory: MemorySnapshot;
  createdAt: string;
  updatedAt: string;
}

export function createCampaignSession(
  id: string,
  name: string,
  configVersion: string,
  initialTension: number,
  now: Date = new Date(),
): CampaignSession {
  const ts = now.toISOString();
  return {
    id,
    name,
    turnNo: 0,
    configVersion,
    character: createEmptyCharacterState(),
    symbolic: createInitialSymbolicState(initialTension),
    memory: createEmptyMemorySnapshot(),
    createdAt: ts,
    updatedAt: ts,
  };
}
