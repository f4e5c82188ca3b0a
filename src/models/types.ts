// Domain types for the triage system
// Timestamps are ISO-8601 strings so documents round-trip through any JSON store.

export type SeverityLevel = 'normal' | 'moderate' | 'critical';

/** 1 = most urgent */
export type Priority = 1 | 2 | 3;

export type VisitStatus = 'waiting' | 'in_progress' | 'completed';

export type QueueStatus = 'waiting' | 'in_progress' | 'completed';

export type ConditionChange = 'improved' | 'same' | 'worsened';

export type CallerRole = 'doctor' | 'patient';

export interface CallerIdentity {
  id: string;
  role: CallerRole;
  name?: string;
}

export interface Vitals {
  temperature?: number;            // Celsius
  heartRate?: number;              // bpm
  bloodPressureSystolic?: number;  // mmHg
  bloodPressureDiastolic?: number; // mmHg
  respiratoryRate?: number;        // breaths/min
  oxygenSaturation?: number;       // SpO2 %
  weight?: number;                 // kg
  height?: number;                 // cm
}

export type VitalName = keyof Vitals;

export interface SymptomReport {
  symptomText: string;
  duration?: string;
  painLevel?: number; // 0-10, self reported
}

export interface Patient {
  id: string;
  firstName: string;
  lastName: string;
  email?: string;
  phone: string;
  dateOfBirth: string;
  gender: 'male' | 'female' | 'other';
  bloodType?: string;
  address?: string;
  emergencyContact?: string;
  medicalHistory: string[];
  allergies: string[];
  currentMedications: string[];
  createdAt: string;
  updatedAt: string;
}

export interface Visit {
  id: string;
  patientId: string;
  chiefComplaint: string;
  symptoms: SymptomReport;
  vitals: Vitals;
  status: VisitStatus;
  triageScore: number | null;
  severityLevel: SeverityLevel | null;
  latestTriageResultId: string | null;
  assignedDoctorId: string | null;
  followUpNote?: string;
  conditionChange?: ConditionChange;
  doctorNoteId?: string;
  createdAt: string;
  updatedAt: string;
  completedAt: string | null;
}

export type ScoreSource = 'rules' | 'ai';

export interface DifferentialDiagnosis {
  diagnosis: string;
  probability: number;
}

/**
 * One scoring snapshot. Immutable once produced.
 */
export interface Assessment {
  score: number;
  level: SeverityLevel;
  priority: Priority;
  detectedSymptoms: string[];
  emergencyFlags: string[];
  vitalAbnormalities: string[];
  reasoning: string;
  ruleBasedOverride: boolean;
  recommendation: string;
  source: ScoreSource;
  components?: {
    symptomScore: number;
    vitalScore: number;
  };
  clinicalConcerns?: string[];
  differential?: DifferentialDiagnosis[];
  confidence?: number;
  fallbackReason?: string;
}

export interface TriageResultRecord extends Assessment {
  id: string;
  visitId: string;
  patientId: string;
  kind: 'initial' | 'reassessment';
  scoreChange?: number;
  conditionChange?: ConditionChange;
  createdAt: string;
}

export interface QueueEntry {
  id: string;
  visitId: string;
  patientId: string;
  patientName: string;
  age: number;
  severityScore: number;
  severityLevel: SeverityLevel;
  priority: Priority;
  chiefComplaint: string;
  symptomsSummary: string;
  vitalSigns: Vitals;
  emergencyFlags: string[];
  queuePosition: number;
  estimatedWaitTime: number; // minutes
  checkedInAt: string;
  status: QueueStatus;
  calledAt?: string;
  assignedDoctorId?: string;
}

export type AlertType =
  | 'severity_change'
  | 'new_critical'
  | 'vital_deterioration'
  | 'long_wait'
  | 'follow_up_worsening';

export type AlertSeverity = 'low' | 'medium' | 'high' | 'critical';

export type AlertVariant =
  | {
      type: 'new_critical';
      payload: { oldLevel: SeverityLevel | null; newLevel: 'critical'; score: number };
    }
  | {
      type: 'severity_change';
      payload: { oldLevel: SeverityLevel; newLevel: SeverityLevel; score: number };
    }
  | {
      type: 'vital_deterioration';
      payload: { abnormalities: string[] };
    }
  | {
      type: 'long_wait';
      payload: { waitMinutes: number; overageMinutes: number; severityLevel: SeverityLevel };
    }
  | {
      type: 'follow_up_worsening';
      payload: { originalScore: number; newScore: number; scoreChange: number };
    };

export interface AlertBase {
  id: string;
  severity: AlertSeverity;
  title: string;
  message: string;
  patientId: string;
  patientName: string;
  visitId: string;
  /** Provider-specific extras only */
  data: Record<string, string>;
  createdAt: string;
  acknowledged: boolean;
  acknowledgedBy: string | null;
  acknowledgedAt: string | null;
}

export type Alert = AlertBase & AlertVariant;

export interface Prescription {
  medication: string;
  dosage: string;
  frequency?: string;
}

export interface DoctorNote {
  id: string;
  visitId: string;
  doctorId: string;
  doctorName: string;
  diagnosis: string;
  treatmentPlan: string;
  prescriptions: Prescription[];
  followUpRequired: boolean;
  followUpDate?: string;
  notes?: string;
  createdAt: string;
}

export interface DeviceRegistration {
  id: string;
  userId: string;
  role: CallerRole;
  token: string;
  registeredAt: string;
}
