import { PreconditionViolation } from '../errors';

/**
 * Evidence enters the protocol as opaque strings; only their size is checked
 */
export function assertText(field: string, value: string, maxLength: number, required: boolean = true): void {
    if (typeof value !== 'string') {
        throw new PreconditionViolation('INVALID_TEXT', `${field} must be a string`);
    }
    if (required && value.trim().length === 0) {
        throw new PreconditionViolation('INVALID_TEXT', `${field} is required`);
    }
    if (value.length > maxLength) {
        throw new PreconditionViolation('INVALID_TEXT', `${field} must be ${maxLength} characters or less`);
    }
}
