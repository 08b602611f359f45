import { apiDelete, apiGet, apiPost } from "../client";
import { CliError } from "../errors";
import { fmtValue, isRecord, listLines, type ListLayout, recordLines, toRecordList } from "../format";
import type { ApnCreateBody, CommandResult, JsonRecord, ListDisplay, RequestContext } from "../types";

function apnName(record: JsonRecord): string {
  return fmtValue(record.name) ?? fmtValue(record.apn) ?? "?";
}

const APN_LAYOUT: ListLayout = {
  keyField: apnName,
  keyFields: ["name", "apn"],
  briefFields: [
    "apn_id",
    "apn_ambr_dl",
    "apn_ambr_ul",
    "arp_preemption_capability",
    "arp_preemption_vulnerability",
    "arp_priority",
    "qci"
  ],
  idLine: (record) => {
    const id = fmtValue(record.apn_id);
    return id === null ? apnName(record) : `${apnName(record)}: id ${id}`;
  }
};

export function apnPath(name?: string): string {
  return name === undefined ? "/apn" : `/apn/${encodeURIComponent(name)}`;
}

export type AddApnOptions = {
  dl?: number;
  ul?: number;
  qci?: number;
  arp?: number;
  preemptionCap?: boolean;
  preemptionVuln?: boolean;
};

export function buildApnBody(name: string, opts: AddApnOptions): ApnCreateBody {
  const body: ApnCreateBody = { name };
  if (opts.dl !== undefined) body.apn_ambr_dl = opts.dl;
  if (opts.ul !== undefined) body.apn_ambr_ul = opts.ul;
  if (opts.qci !== undefined) body.qci = opts.qci;
  if (opts.arp !== undefined) body.arp_priority = opts.arp;
  if (opts.preemptionCap !== undefined) body.arp_preemption_capability = opts.preemptionCap;
  if (opts.preemptionVuln !== undefined) body.arp_preemption_vulnerability = opts.preemptionVuln;
  return body;
}

export async function runListApns(opts: {
  display: ListDisplay;
  name?: string;
  request: RequestContext;
}): Promise<CommandResult<JsonRecord[]>> {
  const res = await apiGet(opts.request, apnPath());
  let apns = toRecordList(res, "APN");
  if (opts.name !== undefined) {
    const name = opts.name;
    apns = apns.filter((record) => apnName(record) === name);
    if (apns.length === 0) {
      throw new CliError("NOT_FOUND", `APN ${name} not found.`);
    }
  }
  return {
    data: apns,
    human: listLines(apns, opts.display, APN_LAYOUT)
  };
}

export async function runAddApn(
  name: string,
  opts: AddApnOptions & { request: RequestContext }
): Promise<CommandResult> {
  const body = buildApnBody(name, opts);
  const res = await apiPost(opts.request, apnPath(), body);

  const human = [`APN ${name} added.`];
  if (isRecord(res)) human.push(...recordLines(res));
  return {
    data: isRecord(res) ? res : body,
    human
  };
}

export async function runRemoveApn(name: string, opts: { request: RequestContext }): Promise<CommandResult> {
  const res = await apiDelete(opts.request, apnPath(name));
  const warnings: string[] = [];
  if (isRecord(res) && typeof res.Result === "string" && res.Result !== "OK") {
    warnings.push(`HSS API reported Result: ${res.Result}`);
  }
  return {
    data: { name, removed: true, response: res },
    human: [`APN ${name} removed.`],
    warnings
  };
}
