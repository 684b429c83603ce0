import { DataSource, FindOptionsWhere, Repository } from 'typeorm';
import { AppError, ErrorKind } from '../errors';
import { Prescription, PrescriptionCandidate } from '../models/Prescription';

export interface PrescriptionFilter {
  patientId?: number;
  appointmentId?: number;
}

export interface Pagination {
  skip: number;
  limit: number;
}

export interface PrescriptionPage {
  items: Prescription[];
  total: number;
}

export const MAX_PAGE_SIZE = 100;

/**
 * Persistence for prescriptions. Records are insert-only.
 */
export class PrescriptionStore {
  private readonly repo: Repository<Prescription>;

  constructor(dataSource: DataSource) {
    this.repo = dataSource.getRepository(Prescription);
  }

  async insert(candidate: PrescriptionCandidate): Promise<Prescription> {
    const saved = await this.run('insert prescription', () =>
      this.repo.save(this.repo.create(candidate))
    );
    // Re-read so issued_at comes back exactly as the database stored it
    return this.get(saved.id);
  }

  async get(id: number): Promise<Prescription> {
    const prescription = await this.run('read prescription', () => this.repo.findOneBy({ id }));

    if (!prescription) {
      throw AppError.fromKind(ErrorKind.NOT_FOUND, 'Prescription not found');
    }

    return prescription;
  }

  async list(filter: PrescriptionFilter, pagination: Pagination): Promise<PrescriptionPage> {
    if (!Number.isInteger(pagination.skip) || pagination.skip < 0) {
      throw new RangeError(`skip must be a non-negative integer, got ${pagination.skip}`);
    }
    if (!Number.isInteger(pagination.limit) || pagination.limit < 1 || pagination.limit > MAX_PAGE_SIZE) {
      throw new RangeError(`limit must be between 1 and ${MAX_PAGE_SIZE}, got ${pagination.limit}`);
    }

    const where: FindOptionsWhere<Prescription> = {};
    if (filter.patientId !== undefined) where.patientId = filter.patientId;
    if (filter.appointmentId !== undefined) where.appointmentId = filter.appointmentId;

    const [items, total] = await this.run('list prescriptions', () =>
      this.repo.findAndCount({
        where,
        order: { issuedAt: 'DESC', id: 'DESC' },
        skip: pagination.skip,
        take: pagination.limit,
      })
    );

    return { items, total };
  }

  private async run<T>(operation: string, query: () => Promise<T>): Promise<T> {
    try {
      return await query();
    } catch (error) {
      throw AppError.fromKind(ErrorKind.STORAGE_UNAVAILABLE, `Failed to ${operation}`, error);
    }
  }
}
