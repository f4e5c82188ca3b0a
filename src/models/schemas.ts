// Request validation schemas shared by routes and services

import { z } from 'zod';

export const VitalsSchema = z
  .object({
    temperature: z.number().min(35).max(43).optional(),
    heartRate: z.number().int().min(40).max(200).optional(),
    bloodPressureSystolic: z.number().int().min(70).max(250).optional(),
    bloodPressureDiastolic: z.number().int().min(40).max(150).optional(),
    respiratoryRate: z.number().int().min(8).max(40).optional(),
    oxygenSaturation: z.number().min(70).max(100).optional(),
    weight: z.number().min(0.5).max(300).optional(),
    height: z.number().min(30).max(250).optional(),
  })
  .strict();

export const SymptomReportSchema = z.object({
  symptomText: z.string().trim().min(10).max(2000),
  duration: z.string().max(200).optional(),
  painLevel: z.number().int().min(0).max(10).optional(),
});

const StringList = z.array(z.string().trim().min(1).max(200)).max(100);

export const PatientInputSchema = z.object({
  firstName: z.string().trim().min(1).max(100),
  lastName: z.string().trim().min(1).max(100),
  email: z.string().email().optional(),
  phone: z.string().regex(/^\+?[1-9]\d{1,14}$/, 'Invalid phone number'),
  dateOfBirth: z.string().refine(value => !Number.isNaN(Date.parse(value)), 'Invalid date'),
  gender: z.enum(['male', 'female', 'other']),
  bloodType: z.enum(['A+', 'A-', 'B+', 'B-', 'AB+', 'AB-', 'O+', 'O-', 'unknown']).optional(),
  address: z.string().max(500).optional(),
  emergencyContact: z.string().max(200).optional(),
  medicalHistory: StringList.default([]),
  allergies: StringList.default([]),
  currentMedications: StringList.default([]),
});

export const PatientUpdateSchema = PatientInputSchema.partial().refine(
  patch => Object.keys(patch).length > 0,
  'At least one field is required',
);

export const AssessRequestSchema = z.object({
  patientId: z.string().min(1),
  chiefComplaint: z.string().trim().min(1).max(500),
  symptoms: SymptomReportSchema,
  vitals: VitalsSchema.default({}),
});

export const FollowUpRequestSchema = z.object({
  visitId: z.string().min(1),
  symptomsUpdate: z.string().trim().min(1).max(2000),
  conditionChange: z.enum(['improved', 'same', 'worsened']),
  newVitals: VitalsSchema.optional(),
});

export const PrescriptionSchema = z.object({
  medication: z.string().trim().min(1).max(200),
  dosage: z.string().trim().min(1).max(200),
  frequency: z.string().max(200).optional(),
});

export const DoctorNoteInputSchema = z.object({
  visitId: z.string().min(1),
  diagnosis: z.string().trim().min(1).max(2000),
  treatmentPlan: z.string().trim().min(1).max(4000),
  prescriptions: z.array(PrescriptionSchema).max(50).default([]),
  followUpRequired: z.boolean().default(false),
  followUpDate: z.string().optional(),
  notes: z.string().max(4000).optional(),
});

export const DeviceRegistrationSchema = z.object({
  token: z.string().trim().min(1).max(4096),
});

export type PatientInput = z.infer<typeof PatientInputSchema>;
export type PatientUpdate = z.infer<typeof PatientUpdateSchema>;
export type AssessRequest = z.infer<typeof AssessRequestSchema>;
export type FollowUpRequest = z.infer<typeof FollowUpRequestSchema>;
export type DoctorNoteInput = z.infer<typeof DoctorNoteInputSchema>;
