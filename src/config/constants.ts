/**
 * Defaults and fixed values for the digest job
 */

export const PNCP_DEFAULTS = {
  BASE_URL: 'https://pncp.gov.br/api/consulta',
  PUBLIC_URL: 'https://pncp.gov.br',
  /** Pregão, concorrência, dispensa and inexigibilidade */
  MODALITIES: [4, 5, 6, 7, 8, 9],
  PAGE_SIZE: 50,
  MIN_PAGE_SIZE: 10,
  MAX_PAGE_SIZE: 500,
  MAX_PAGES: 20,
  /** The consultation API refuses windows longer than a year */
  MAX_WINDOW_DAYS: 365,
} as const;

export const SEARCH_DEFAULTS = {
  KEYWORDS: ['obra', 'engenharia', 'construção', 'reforma', 'pavimentação', 'edificação', 'infraestrutura', 'saneamento'],
  DAYS_BACK: 7,
  TIME_ZONE: 'America/Sao_Paulo',
} as const;

export const SMTP_DEFAULTS = {
  HOST: 'smtp.gmail.com',
  PORT: 465,
} as const;

export const RETRY_DEFAULTS = {
  FETCH_MAX_ATTEMPTS: 3,
  DELIVERY_MAX_ATTEMPTS: 2,
  BASE_DELAY_MS: 1000,
  MAX_DELAY_MS: 30000,
  MULTIPLIER: 2,
} as const;

export const TIMEOUTS = {
  HTTP_REQUEST_MS: 30000,
  EMAIL_SEND_MS: 30000,
} as const;

/**
 * Process exit status per run outcome. Stable: the scheduler alerts on these.
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  UNEXPECTED_ERROR: 1,
  CONFIGURATION_ERROR: 2,
  PARTIAL_FAILURE: 3,
  FETCH_FAILURE: 4,
  DELIVERY_FAILURE: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * PNCP modality names (codigoModalidadeContratacao)
 */
export const MODALITY_NAMES: Readonly<Record<number, string>> = {
  1: 'Leilão - Eletrônico',
  2: 'Diálogo Competitivo',
  3: 'Concurso',
  4: 'Concorrência - Eletrônica',
  5: 'Concorrência - Presencial',
  6: 'Pregão - Eletrônico',
  7: 'Pregão - Presencial',
  8: 'Dispensa de Licitação',
  9: 'Inexigibilidade',
  10: 'Manifestação de Interesse',
  11: 'Pré-qualificação',
  12: 'Credenciamento',
  13: 'Leilão - Presencial',
};

export function modalityName(code: number): string {
  return MODALITY_NAMES[code] ?? 'Desconhecida';
}
