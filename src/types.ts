export type CommandResult<TData = unknown> = {
  data: TData;
  human: string[];
  warnings?: string[];
};

export type GlobalOptions = {
  json: boolean;
  quiet: boolean;
  verbose: boolean;
};

export type CliConfig = GlobalOptions & {
  api: string;
  apiKey?: string;
  timeoutMs: number;
};

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export type RequestContext = {
  api: string;
  apiKey?: string;
  timeoutMs: number;
  verbose?: boolean;
  signal?: AbortSignal;
  fetchFn?: FetchFn;
};

export type ListDisplay = "id" | "brief" | "long";

export type JsonRecord = Record<string, unknown>;

export type SubscriberCreateBody = {
  imsi: string;
  ki: string;
  opc: string;
  msisdn?: string;
  iccid?: string;
  sqn?: number;
  default_apn: string;
  apn: string[];
};

export type ApnCreateBody = {
  name: string;
  apn_ambr_dl?: number;
  apn_ambr_ul?: number;
  qci?: number;
  arp_priority?: number;
  arp_preemption_capability?: boolean;
  arp_preemption_vulnerability?: boolean;
};
