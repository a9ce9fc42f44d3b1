import type { ProviderErrorCategory } from "../domain/common/errors";

export const ExitCode = {
  success: 0,
  failure: 1,
  usage: 2,
  authentication: 3,
  badRequest: 4,
  unavailable: 5,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function exitCodeForCategory(category: ProviderErrorCategory): ExitCode {
  switch (category) {
    case "authentication":
      return ExitCode.authentication;
    case "bad_request":
      return ExitCode.badRequest;
    case "rate_limit":
    case "server_error":
    case "timeout":
    case "connection":
      return ExitCode.unavailable;
    case "cancelled":
    case "unknown":
      return ExitCode.failure;
  }
}
