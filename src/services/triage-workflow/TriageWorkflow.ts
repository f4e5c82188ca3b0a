// Intake and follow-up pipeline:
// score → persist result → update visit → queue → alerts.
// Scoring failures stop the pipeline before the queue; anything after scoring
// is reported as an issue on the response.

import type { TriageStore } from '../../db/index.js';
import type { Logger } from '../../logger.js';
import type { AssessRequest, FollowUpRequest } from '../../models/schemas.js';
import { levelForScore, recommendationForLevel } from '../../models/severity.js';
import type { AlertVariant, QueueEntry, TriageResultRecord } from '../../models/types.js';
import { isTerminal } from '../../models/visit-state.js';
import { AppError } from '../../utils/errors.js';
import { Mutex } from '../../utils/mutex.js';
import { evaluateTransitions, type AlertSubject, type NotificationService } from '../notifications/index.js';
import { computeAge, fullName } from '../patients.js';
import type { QueueManager, SeverityUpdate } from '../queue/index.js';
import type { ScoringPolicy } from '../scoring/index.js';
import { analyzeVitals, describeVitalFinding, reassess, type TriageOptions } from '../triage/index.js';
import { EMERGENCY_RECOMMENDATION } from '../triage/rules.js';
import type { AlertSummary, AssessResponse, FollowUpResponse, TriageResultView, WorkflowIssue } from './types.js';

const SYMPTOM_SUMMARY_LENGTH = 200;

export interface TriageWorkflowOptions {
  store: TriageStore;
  scoring: ScoringPolicy;
  queue: QueueManager;
  notifications: NotificationService;
  logger: Logger;
  triage?: TriageOptions;
  now?: () => Date;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class TriageWorkflow {
  private readonly store: TriageStore;
  private readonly scoring: ScoringPolicy;
  private readonly queue: QueueManager;
  private readonly notifications: NotificationService;
  private readonly logger: Logger;
  private readonly triage: TriageOptions;
  private readonly now: () => Date;
  private readonly visitLocks = new Map<string, Mutex>();

  constructor(options: TriageWorkflowOptions) {
    this.store = options.store;
    this.scoring = options.scoring;
    this.queue = options.queue;
    this.notifications = options.notifications;
    this.logger = options.logger;
    this.triage = options.triage ?? {};
    this.now = options.now ?? (() => new Date());
  }

  async assess(request: AssessRequest): Promise<AssessResponse> {
    const patient = await this.store.patients.get(request.patientId);
    if (!patient) {
      throw AppError.notFound(`Patient ${request.patientId} not found`);
    }

    const createdAt = this.now().toISOString();
    const visit = await this.store.visits.insert({
      id: this.store.visits.newId(),
      patientId: patient.id,
      chiefComplaint: request.chiefComplaint,
      symptoms: request.symptoms,
      vitals: request.vitals,
      status: 'waiting',
      triageScore: null,
      severityLevel: null,
      latestTriageResultId: null,
      assignedDoctorId: null,
      createdAt,
      updatedAt: createdAt,
      completedAt: null,
    });

    const outcome = await this.scoring.score({
      symptomText: request.symptoms.symptomText,
      vitals: request.vitals,
      context: {
        age: computeAge(patient.dateOfBirth, this.now()),
        painLevel: request.symptoms.painLevel,
        duration: request.symptoms.duration,
        comorbidities: patient.medicalHistory,
      },
    });

    if (!outcome.ok) {
      this.logger.error({ visitId: visit.id, reason: outcome.failure.reason }, 'Triage scoring failed');
      throw AppError.scoringFailed(`Severity scoring failed: ${outcome.failure.message}`, {
        visitId: visit.id,
        reason: outcome.failure.reason,
      });
    }

    const assessment = outcome.result;
    const triageResult = await this.store.triageResults.insert({
      ...assessment,
      id: this.store.triageResults.newId(),
      visitId: visit.id,
      patientId: patient.id,
      kind: 'initial',
      createdAt: this.now().toISOString(),
    });

    const updatedVisit =
      (await this.store.visits.update(visit.id, {
        triageScore: triageResult.score,
        severityLevel: triageResult.level,
        latestTriageResultId: triageResult.id,
        updatedAt: this.now().toISOString(),
      })) ?? visit;

    this.logger.info(
      { visitId: visit.id, score: triageResult.score, level: triageResult.level, source: triageResult.source },
      'Triage assessment complete',
    );

    const issues: WorkflowIssue[] = [];
    const subject: AlertSubject = { patientId: patient.id, patientName: fullName(patient), visitId: visit.id };

    let queueEntry: QueueEntry | null = null;
    try {
      queueEntry = await this.queue.enqueue({
        visitId: visit.id,
        patientId: patient.id,
        patientName: subject.patientName,
        age: computeAge(patient.dateOfBirth, this.now()),
        severityScore: triageResult.score,
        severityLevel: triageResult.level,
        priority: triageResult.priority,
        chiefComplaint: request.chiefComplaint,
        symptomsSummary: request.symptoms.symptomText.slice(0, SYMPTOM_SUMMARY_LENGTH),
        vitalSigns: request.vitals,
        emergencyFlags: triageResult.emergencyFlags,
      });
    } catch (err) {
      this.logger.warn({ err, visitId: visit.id }, 'Queue insertion failed');
      issues.push({ stage: 'queue', message: errorMessage(err) });
    }

    const alerts = await this.dispatchAlerts(
      subject,
      evaluateTransitions({
        kind: 'initial',
        level: triageResult.level,
        score: triageResult.score,
        vitalAbnormalities: triageResult.vitalAbnormalities,
      }),
      issues,
    );

    return { visitId: visit.id, visit: updatedVisit, triageResult, queueEntry, alerts, issues };
  }

  /** Follow-ups on the same visit run one at a time so each reassesses the previous result */
  async followUp(request: FollowUpRequest): Promise<FollowUpResponse> {
    let lock = this.visitLocks.get(request.visitId);
    if (!lock) {
      lock = new Mutex();
      this.visitLocks.set(request.visitId, lock);
    }
    const visitLock = lock;

    try {
      return await visitLock.runExclusive(() => this.reassessVisit(request));
    } finally {
      if (!visitLock.isLocked && this.visitLocks.get(request.visitId) === visitLock) {
        this.visitLocks.delete(request.visitId);
      }
    }
  }

  private async reassessVisit(request: FollowUpRequest): Promise<FollowUpResponse> {
    const visit = await this.store.visits.get(request.visitId);
    if (!visit) {
      throw AppError.notFound(`Visit ${request.visitId} not found`);
    }
    if (isTerminal(visit.status)) {
      throw AppError.conflict(`Visit ${request.visitId} is already completed`);
    }
    if (visit.triageScore === null) {
      throw AppError.validationError(`Visit ${request.visitId} has no triage score to reassess`);
    }

    const originalScore = visit.triageScore;
    const oldLevel = visit.severityLevel ?? levelForScore(originalScore);
    const reassessment = reassess(originalScore, request.symptomsUpdate, request.conditionChange, this.triage);

    const vitalAbnormalities = request.newVitals
      ? analyzeVitals(request.newVitals).findings.map(describeVitalFinding)
      : [];
    const override = reassessment.emergencyFlags.length > 0;

    const triageResult: TriageResultRecord = await this.store.triageResults.insert({
      id: this.store.triageResults.newId(),
      visitId: visit.id,
      patientId: visit.patientId,
      kind: 'reassessment',
      score: reassessment.score,
      level: reassessment.level,
      priority: reassessment.priority,
      detectedSymptoms: reassessment.detectedSymptoms,
      emergencyFlags: reassessment.emergencyFlags,
      vitalAbnormalities,
      reasoning: reassessment.reasoning,
      ruleBasedOverride: override,
      recommendation: override ? EMERGENCY_RECOMMENDATION : recommendationForLevel(reassessment.level),
      source: 'rules',
      scoreChange: reassessment.scoreChange,
      conditionChange: reassessment.conditionChange,
      createdAt: this.now().toISOString(),
    });

    await this.store.visits.update(visit.id, {
      triageScore: reassessment.score,
      severityLevel: reassessment.level,
      latestTriageResultId: triageResult.id,
      followUpNote: request.symptomsUpdate,
      conditionChange: request.conditionChange,
      vitals: request.newVitals ? { ...visit.vitals, ...request.newVitals } : visit.vitals,
      updatedAt: this.now().toISOString(),
    });

    const issues: WorkflowIssue[] = [];
    const severityChanged = reassessment.level !== oldLevel;

    let queueUpdate: SeverityUpdate | null = null;
    if (visit.status === 'waiting' && (severityChanged || reassessment.scoreChange !== 0)) {
      try {
        queueUpdate = await this.queue.updateSeverity(visit.id, reassessment.score, reassessment.level);
      } catch (err) {
        this.logger.warn({ err, visitId: visit.id }, 'Queue severity update failed');
        issues.push({ stage: 'queue', message: errorMessage(err) });
      }
    }

    const patient = await this.store.patients.get(visit.patientId);
    const subject: AlertSubject = {
      patientId: visit.patientId,
      patientName: patient ? fullName(patient) : 'Unknown patient',
      visitId: visit.id,
    };

    const alerts = await this.dispatchAlerts(
      subject,
      evaluateTransitions({
        kind: 'reassessment',
        oldLevel,
        newLevel: reassessment.level,
        originalScore,
        score: reassessment.score,
        conditionChange: request.conditionChange,
        vitalAbnormalities,
      }),
      issues,
    );

    this.logger.info(
      { visitId: visit.id, from: originalScore, to: reassessment.score, change: request.conditionChange },
      'Follow-up reassessment complete',
    );

    return { visitId: visit.id, reassessment, triageResult, severityChanged, queueUpdate, alerts, issues };
  }

  async getResult(visitId: string): Promise<TriageResultView> {
    const visit = await this.store.visits.get(visitId);
    if (!visit) {
      throw AppError.notFound(`Visit ${visitId} not found`);
    }

    const history = await this.store.triageResults.query({
      where: { visitId },
      orderBy: [{ field: 'createdAt', direction: 'asc' }],
    });
    const latest = visit.latestTriageResultId
      ? history.find(r => r.id === visit.latestTriageResultId) ?? null
      : null;

    return { visit, triageResult: latest, history };
  }

  private async dispatchAlerts(
    subject: AlertSubject,
    variants: AlertVariant[],
    issues: WorkflowIssue[],
  ): Promise<AlertSummary[]> {
    const summaries: AlertSummary[] = [];

    for (const variant of variants) {
      try {
        const { alert, delivery } = await this.notifications.dispatch(subject, variant);
        summaries.push({ alertId: alert.id, type: alert.type, severity: alert.severity, delivery });
      } catch (err) {
        this.logger.warn({ err, visitId: subject.visitId, type: variant.type }, 'Alert dispatch failed');
        issues.push({ stage: 'notification', message: errorMessage(err) });
      }
    }

    return summaries;
  }
}

