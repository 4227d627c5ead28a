export interface FieldError {
  path: string;
  message: string;
}

export type ProblemCode =
  | "INVALID_ARGUMENT"
  | "UNSUPPORTED_MEDIA_TYPE"
  | "PAYLOAD_TOO_LARGE"
  | "NOT_FOUND"
  | "METHOD_NOT_ALLOWED"
  | "INTERNAL";

/** RFC 7807 body. */
export interface Problem {
  type: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
  code: ProblemCode;
  requestId?: string;
  errors?: FieldError[];
}

export const PROBLEM_CONTENT_TYPE = "application/problem+json";

export function problem(params: Omit<Problem, "type" | "title">): Problem {
  const type = `https://errors.urdu-text-engine.local/${params.code.toLowerCase().replace(/_/g, "-")}`;
  return {
    type,
    title: codeToTitle(params.code),
    status: params.status,
    detail: params.detail,
    instance: params.instance,
    code: params.code,
    requestId: params.requestId,
    errors: params.errors,
  };
}

function codeToTitle(code: ProblemCode): string {
  switch (code) {
    case "INVALID_ARGUMENT":
      return "Invalid argument";
    case "UNSUPPORTED_MEDIA_TYPE":
      return "Unsupported media type";
    case "PAYLOAD_TOO_LARGE":
      return "Payload too large";
    case "NOT_FOUND":
      return "Not found";
    case "METHOD_NOT_ALLOWED":
      return "Method not allowed";
    case "INTERNAL":
      return "Internal error";
  }
}
