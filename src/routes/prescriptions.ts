import { Router } from 'express';
import { body, param, query, ValidationChain } from 'express-validator';
import { asyncHandler } from '../middleware/errorHandler';
import { createPrescriptionController, PrescriptionControllerDeps } from '../controllers/prescriptionController';
import { MAX_PAGE_SIZE } from '../services/prescriptionStore';

// Columns are Postgres int4
export const MAX_INT = 2147483647;

const intField = (chain: ValidationChain, field: string, min: number, message: string) =>
  chain
    .not().isArray().withMessage(`${field} must be given once`).bail()
    .isInt({ min, max: MAX_INT }).withMessage(message)
    .toInt();

const requiredInt = (field: string) =>
  intField(
    body(field).exists({ values: 'null' }).withMessage(`${field} is required`).bail(),
    field,
    1,
    `${field} must be a positive integer`
  );

const optionalQueryInt = (field: string, min: number, message: string) =>
  intField(query(field).optional(), field, min, message);

const textField = (field: string) =>
  body(field)
    .isString().withMessage(`${field} must be a string`).bail()
    .trim()
    .notEmpty().withMessage(`${field} is required`);

export const createPrescriptionRoutes = (deps: PrescriptionControllerDeps): Router => {
  const router = Router();
  const controller = createPrescriptionController(deps);

  /**
   * POST /prescriptions
   * Issue a prescription for a completed appointment
   */
  router.post('/',
    [
      requiredInt('appointment_id'),
      requiredInt('patient_id'),
      requiredInt('doctor_id'),
      textField('medication'),
      textField('dosage'),
      requiredInt('days')
    ],
    asyncHandler(controller.createPrescription)
  );

  /**
   * GET /prescriptions
   * List prescriptions, newest first, optionally filtered by patient or appointment
   */
  router.get('/',
    [
      optionalQueryInt('skip', 0, 'skip must be a non-negative integer'),
      query('limit').optional()
        .not().isArray().withMessage('limit must be given once').bail()
        .isInt({ min: 1, max: MAX_PAGE_SIZE }).withMessage(`limit must be between 1 and ${MAX_PAGE_SIZE}`)
        .toInt(),
      optionalQueryInt('patient_id', 1, 'patient_id must be a positive integer'),
      optionalQueryInt('appointment_id', 1, 'appointment_id must be a positive integer')
    ],
    asyncHandler(controller.listPrescriptions)
  );

  /**
   * GET /prescriptions/:id
   */
  router.get('/:id',
    param('id').isInt({ min: 1, max: MAX_INT }).withMessage('Invalid prescription ID').toInt(),
    asyncHandler(controller.getPrescription)
  );

  return router;
};
