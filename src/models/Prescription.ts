import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index } from 'typeorm';

/**
 * Prescription entity - a medication order issued against a completed appointment.
 * Rows are written once and never updated.
 */
@Entity('prescriptions')
export class Prescription {
  @PrimaryGeneratedColumn({ name: 'prescription_id' })
  id!: number;

  // Appointment lives in another service, so there is no foreign key
  @Index()
  @Column({ name: 'appointment_id', type: 'integer' })
  appointmentId!: number;

  @Index()
  @Column({ name: 'patient_id', type: 'integer' })
  patientId!: number;

  @Index()
  @Column({ name: 'doctor_id', type: 'integer' })
  doctorId!: number;

  @Column({ type: 'varchar' })
  medication!: string;

  @Column({ type: 'varchar' })
  dosage!: string;

  @Column({ type: 'integer' })
  days!: number;

  @CreateDateColumn({ name: 'issued_at', type: 'timestamptz' })
  issuedAt!: Date;
}

export type PrescriptionCandidate = Pick<
  Prescription,
  'appointmentId' | 'patientId' | 'doctorId' | 'medication' | 'dosage' | 'days'
>;

/**
 * Wire representation returned by the HTTP API
 */
export interface PrescriptionResponse {
  prescription_id: number;
  appointment_id: number;
  patient_id: number;
  doctor_id: number;
  medication: string;
  dosage: string;
  days: number;
  issued_at: string;
}

export const toPrescriptionResponse = (prescription: Prescription): PrescriptionResponse => ({
  prescription_id: prescription.id,
  appointment_id: prescription.appointmentId,
  patient_id: prescription.patientId,
  doctor_id: prescription.doctorId,
  medication: prescription.medication,
  dosage: prescription.dosage,
  days: prescription.days,
  issued_at: prescription.issuedAt.toISOString(),
});
