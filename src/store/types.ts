import type { PairingAlgorithm, Participant, SearchMethod } from '../pairing/types';

export interface Organiser {
  id: number;
  username: string;
  passwordHash: string;
  displayName: string | null;
  createdAt: Date;
}

export interface NewOrganiser {
  username: string;
  passwordHash: string;
  displayName: string | null;
}

export interface Draw {
  id: number;
  organiserId: number;
  title: string;
  algorithm: PairingAlgorithm;
  seed: string;
  method: SearchMethod;
  createdAt: Date;
}

export type NewDraw = Omit<Draw, 'id' | 'createdAt'>;

export interface DrawSummary extends Draw {
  participantCount: number;
  revealedCount: number;
}

export interface Assignment {
  giver: Participant;
  receiver: Participant;
  revealToken: string;
  padding: string;
  revealedAt: Date | null;
}

export type NewAssignment = Omit<Assignment, 'revealedAt'>;

export interface OrganiserStore {
  create(organiser: NewOrganiser): Promise<Organiser>;
  findByUsername(username: string): Promise<Organiser | null>;
  findById(id: number): Promise<Organiser | null>;
}

export interface DrawStore {
  /** Insert the draw and all of its assignments atomically */
  create(draw: NewDraw, assignments: NewAssignment[]): Promise<Draw>;
  listByOrganiser(organiserId: number): Promise<DrawSummary[]>;
  findById(id: number): Promise<Draw | null>;
  /** Assignments in giver order as drawn */
  listAssignments(drawId: number): Promise<Assignment[]>;
  findByRevealToken(token: string): Promise<{ draw: Draw; assignment: Assignment } | null>;
  /** Record the first reveal; later reveals keep that time */
  markRevealed(token: string, at: Date): Promise<void>;
  delete(id: number): Promise<boolean>;
  deleteCreatedBefore(cutoff: Date): Promise<number>;
}

export interface Stores {
  organisers: OrganiserStore;
  draws: DrawStore;
}
