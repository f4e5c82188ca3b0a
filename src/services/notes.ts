// Doctor consultation notes. Saving a note closes the visit.

import type { TriageStore } from '../db/index.js';
import type { Logger } from '../logger.js';
import type { DoctorNoteInput } from '../models/schemas.js';
import type { CallerIdentity, DoctorNote, Visit } from '../models/types.js';
import { isTerminal } from '../models/visit-state.js';
import { AppError } from '../utils/errors.js';
import type { QueueManager } from './queue/index.js';

export interface SavedNote {
  note: DoctorNote;
  visit: Visit;
}

export class NoteService {
  constructor(
    private readonly store: TriageStore,
    private readonly queue: QueueManager,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async saveNote(input: DoctorNoteInput, doctor: CallerIdentity): Promise<SavedNote> {
    const visit = await this.store.visits.get(input.visitId);
    if (!visit) {
      throw AppError.notFound(`Visit ${input.visitId} not found`);
    }
    if (isTerminal(visit.status)) {
      throw AppError.conflict(`Visit ${input.visitId} is already completed`);
    }

    const note = await this.store.doctorNotes.insert({
      ...input,
      id: this.store.doctorNotes.newId(),
      doctorId: doctor.id,
      doctorName: doctor.name ?? doctor.id,
      createdAt: this.now().toISOString(),
    });

    await this.queue.completeVisit(input.visitId);
    const updated = await this.store.visits.update(input.visitId, { doctorNoteId: note.id });

    this.logger.info({ visitId: input.visitId, noteId: note.id, doctorId: doctor.id }, 'Consultation note saved');
    return { note, visit: updated ?? visit };
  }

  async getNotes(visitId: string): Promise<DoctorNote[]> {
    const notes = await this.store.doctorNotes.query({
      where: { visitId },
      orderBy: [{ field: 'createdAt', direction: 'desc' }],
    });
    if (notes.length === 0) {
      throw AppError.notFound(`No notes for visit ${visitId}`);
    }
    return notes;
  }
}
