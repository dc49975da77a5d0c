import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { ComplaintStatus } from '../enums/complaint.enum';

export type FieldErrors = Record<string, string[]>;

export class ValidationError extends BadRequestException {
  constructor(
    message: string,
    readonly errors: FieldErrors = {},
  ) {
    super({ success: false, message, error: 'VALIDATION_ERROR', errors });
  }
}

export class PermissionError extends ForbiddenException {
  constructor(message: string) {
    super({ success: false, message, error: 'PERMISSION_ERROR' });
  }
}

export class StateError extends UnprocessableEntityException {
  constructor(
    message: string,
    readonly currentStatus: ComplaintStatus,
    readonly allowedStatuses: ComplaintStatus[] = [],
  ) {
    super({
      success: false,
      message,
      error: 'STATE_ERROR',
      current_status: currentStatus,
      allowed_statuses: allowedStatuses,
    });
  }
}

export class ConflictError extends ConflictException {
  constructor(message: string) {
    super({ success: false, message, error: 'CONFLICT_ERROR' });
  }
}

export class NotFoundError extends NotFoundException {
  constructor(message: string) {
    super({ success: false, message, error: 'NOT_FOUND' });
  }
}
