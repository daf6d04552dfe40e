/**
 * Formato padrão das respostas da API.
 * Todo erro retorna: success: false, error + description (mesma mensagem, ambas preenchidas).
 */
export type ErrorPayload = {
  success: false;
  error: string;
  description: string;
};

export function errorPayload(message: string): ErrorPayload {
  return {
    success: false,
    error: message,
    description: message
  };
}

export function successPayload<T>(data: T): { success: true; data: T } {
  return { success: true, data };
}

/** Status HTTP seguro a partir do erro: só 4xx/5xx, 500 quando não informado. */
export function statusFromError(err: { statusCode?: number }): number {
  const status = err.statusCode;
  if (typeof status === "number" && status >= 400 && status < 600) return status;
  return 500;
}
