export interface ErrorEnvelope {
  ok: false;
  error: {
    code: string;
    message: string;
  };
}

export function errorEnvelope(code: string, message: string): ErrorEnvelope {
  return { ok: false, error: { code, message } };
}
