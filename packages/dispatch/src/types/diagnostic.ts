/**
 * Diagnostic types for dispatch failures
 */

export type DiagnosticCode =
  // Registration (SIG1xxx)
  | "SIG1001" // Signature of a callable cannot be determined
  | "SIG1002" // Condition signature differs from handler signature
  // Binding (SIG2xxx)
  | "SIG2001" // Argument binding against a variadic signature
  | "SIG2002" // Required argument missing at bind time
  // Invocation (SIG3xxx)
  | "SIG3001" // No entry accepts the call shape
  | "SIG3002"; // Entries accept the shape but no condition holds

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly message: string;
  /** Name of the dispatcher or callable the diagnostic is about */
  readonly subject?: string;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  message: string,
  subject?: string,
  hint?: string
): Diagnostic => ({
  code,
  message,
  subject,
  hint,
});

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.subject) {
    parts.push(`[${diagnostic.subject}]`);
  }

  parts.push(`${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};
