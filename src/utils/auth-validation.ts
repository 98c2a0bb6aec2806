export const MIN_PASSWORD_LENGTH = 8;
export const MAX_PASSWORD_LENGTH = 100;

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export interface LoginRequest {
  username: string;
  password: string;
}

export interface RefreshRequest {
  refresh_token: string;
}

export interface ChangePasswordRequest {
  current_password: string;
  new_password: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(body: Record<string, unknown>, field: string, errors: string[]): string {
  const value = body[field];
  if (typeof value !== 'string' || value.trim().length === 0) {
    errors.push(`${field} is required`);
    return '';
  }
  return value;
}

export function isPasswordWithinPolicy(password: string): boolean {
  return password.length >= MIN_PASSWORD_LENGTH && password.length <= MAX_PASSWORD_LENGTH;
}

export function validateLoginRequest(body: unknown): ValidationResult & { data?: LoginRequest } {
  const errors: string[] = [];
  if (!isRecord(body)) {
    return { valid: false, errors: ['Request body must be a JSON object'] };
  }

  const username = requireString(body, 'username', errors);
  const password = requireString(body, 'password', errors);

  return errors.length === 0
    ? { valid: true, errors, data: { username: username.trim(), password } }
    : { valid: false, errors };
}

export function validateRefreshRequest(body: unknown): ValidationResult & { data?: RefreshRequest } {
  const errors: string[] = [];
  if (!isRecord(body)) {
    return { valid: false, errors: ['Request body must be a JSON object'] };
  }

  const refreshToken = requireString(body, 'refresh_token', errors);

  return errors.length === 0
    ? { valid: true, errors, data: { refresh_token: refreshToken.trim() } }
    : { valid: false, errors };
}

export function validateChangePasswordRequest(body: unknown): ValidationResult & { data?: ChangePasswordRequest } {
  const errors: string[] = [];
  if (!isRecord(body)) {
    return { valid: false, errors: ['Request body must be a JSON object'] };
  }

  const currentPassword = requireString(body, 'current_password', errors);
  const newPassword = requireString(body, 'new_password', errors);

  if (newPassword && !isPasswordWithinPolicy(newPassword)) {
    errors.push(`new_password must be between ${MIN_PASSWORD_LENGTH} and ${MAX_PASSWORD_LENGTH} characters`);
  }

  return errors.length === 0
    ? { valid: true, errors, data: { current_password: currentPassword, new_password: newPassword } }
    : { valid: false, errors };
}
