import type {
  Assignment,
  Draw,
  DrawStore,
  DrawSummary,
  NewAssignment,
  NewDraw,
  NewOrganiser,
  Organiser,
  OrganiserStore,
  Stores,
} from '../../store/types';

export class MemoryOrganiserStore implements OrganiserStore {
  private organisers: Organiser[] = [];

  async create(organiser: NewOrganiser): Promise<Organiser> {
    const created = { ...organiser, id: this.organisers.length + 1, createdAt: new Date() };
    this.organisers.push(created);
    return created;
  }

  async findByUsername(username: string): Promise<Organiser | null> {
    return this.organisers.find((organiser) => organiser.username === username) ?? null;
  }

  async findById(id: number): Promise<Organiser | null> {
    return this.organisers.find((organiser) => organiser.id === id) ?? null;
  }
}

export class MemoryDrawStore implements DrawStore {
  private nextId = 1;
  draws: Draw[] = [];
  assignments = new Map<number, Assignment[]>();

  async create(draw: NewDraw, assignments: NewAssignment[]): Promise<Draw> {
    const created: Draw = { ...draw, id: this.nextId++, createdAt: new Date() };
    this.draws.push(created);
    this.assignments.set(
      created.id,
      assignments.map((assignment) => ({ ...assignment, revealedAt: null }))
    );
    return created;
  }

  async listByOrganiser(organiserId: number): Promise<DrawSummary[]> {
    return this.draws
      .filter((draw) => draw.organiserId === organiserId)
      .map((draw) => {
        const assignments = this.assignments.get(draw.id) ?? [];
        return {
          ...draw,
          participantCount: assignments.length,
          revealedCount: assignments.filter((assignment) => assignment.revealedAt !== null).length,
        };
      });
  }

  async findById(id: number): Promise<Draw | null> {
    return this.draws.find((draw) => draw.id === id) ?? null;
  }

  async listAssignments(drawId: number): Promise<Assignment[]> {
    return (this.assignments.get(drawId) ?? []).map((assignment) => ({ ...assignment }));
  }

  async findByRevealToken(token: string): Promise<{ draw: Draw; assignment: Assignment } | null> {
    for (const [drawId, assignments] of this.assignments) {
      const assignment = assignments.find((candidate) => candidate.revealToken === token);
      const draw = this.draws.find((candidate) => candidate.id === drawId);
      if (assignment && draw) {
        return { draw, assignment: { ...assignment } };
      }
    }
    return null;
  }

  async markRevealed(token: string, at: Date): Promise<void> {
    for (const assignments of this.assignments.values()) {
      const assignment = assignments.find((candidate) => candidate.revealToken === token);
      if (assignment && assignment.revealedAt === null) {
        assignment.revealedAt = at;
      }
    }
  }

  async delete(id: number): Promise<boolean> {
    const before = this.draws.length;
    this.draws = this.draws.filter((draw) => draw.id !== id);
    this.assignments.delete(id);
    return this.draws.length < before;
  }

  async deleteCreatedBefore(cutoff: Date): Promise<number> {
    const expired = this.draws.filter((draw) => draw.createdAt < cutoff);
    for (const draw of expired) {
      await this.delete(draw.id);
    }
    return expired.length;
  }
}

export function createMemoryStores(): Stores & { draws: MemoryDrawStore } {
  return {
    organisers: new MemoryOrganiserStore(),
    draws: new MemoryDrawStore(),
  };
}
