import type { ConfigFailureReason } from './config';

const FAILURE_STATUS: Record<ConfigFailureReason, number> = {
  invalid: 400,
  duplicate: 409,
  not_found: 404,
  in_use: 400,
};

export function failureStatus(reason: ConfigFailureReason): number {
  return FAILURE_STATUS[reason];
}
