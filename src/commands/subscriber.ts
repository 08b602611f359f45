import { apiDelete, apiGet, apiPost } from "../client";
import { CliError } from "../errors";
import { fmtValue, isRecord, listLines, type ListLayout, recordLines, toRecordList } from "../format";
import type { CommandResult, JsonRecord, ListDisplay, RequestContext, SubscriberCreateBody } from "../types";

const SUBSCRIBER_LAYOUT: ListLayout = {
  keyField: (record) => fmtValue(record.imsi) ?? "?",
  keyFields: ["imsi"],
  briefFields: ["msisdn", "default_apn", "apn", "enabled", "roaming_enabled", "ue_ambr_dl", "ue_ambr_ul"],
  idLine: (record) => fmtValue(record.imsi) ?? "?"
};

export function subscriberPath(imsi?: string): string {
  return imsi === undefined ? "/subscriber" : `/subscriber/${encodeURIComponent(imsi)}`;
}

export type AddSubscriberOptions = {
  ki: string;
  opc: string;
  msisdn?: string;
  iccid?: string;
  sqn?: number;
  defaultApn: string;
  apn?: string[];
};

export function buildSubscriberBody(imsi: string, opts: AddSubscriberOptions): SubscriberCreateBody {
  const body: SubscriberCreateBody = {
    imsi,
    ki: opts.ki,
    opc: opts.opc,
    default_apn: opts.defaultApn,
    apn: [...(opts.apn ?? [])]
  };
  if (opts.msisdn !== undefined) body.msisdn = opts.msisdn;
  if (opts.iccid !== undefined) body.iccid = opts.iccid;
  if (opts.sqn !== undefined) body.sqn = opts.sqn;
  return body;
}

export async function runListSubscribers(opts: {
  display: ListDisplay;
  imsi?: string;
  limit?: number;
  page?: number;
  request: RequestContext;
}): Promise<CommandResult<JsonRecord[]>> {
  const res = await apiGet(opts.request, subscriberPath(), {
    page_size: opts.limit,
    page: opts.page
  });
  let subscribers = toRecordList(res, "subscriber");
  if (opts.imsi !== undefined) {
    const imsi = opts.imsi;
    subscribers = subscribers.filter((record) => fmtValue(record.imsi) === imsi);
    if (subscribers.length === 0) {
      throw new CliError("NOT_FOUND", `Subscriber ${imsi} not found.`, {
        hint: "Only the requested page is searched; see --limit and --page."
      });
    }
  }
  return {
    data: subscribers,
    human: listLines(subscribers, opts.display, SUBSCRIBER_LAYOUT)
  };
}

export async function runAddSubscriber(
  imsi: string,
  opts: AddSubscriberOptions & { request: RequestContext }
): Promise<CommandResult> {
  const body = buildSubscriberBody(imsi, opts);
  const res = await apiPost(opts.request, subscriberPath(), body);

  const human = [`Subscriber ${imsi} added.`];
  if (isRecord(res)) human.push(...recordLines(res));
  return {
    data: isRecord(res) ? res : body,
    human
  };
}

export async function runRemoveSubscriber(
  imsi: string,
  opts: { request: RequestContext }
): Promise<CommandResult> {
  const res = await apiDelete(opts.request, subscriberPath(imsi));
  const warnings: string[] = [];
  if (isRecord(res) && typeof res.Result === "string" && res.Result !== "OK") {
    warnings.push(`HSS API reported Result: ${res.Result}`);
  }
  return {
    data: { imsi, removed: true, response: res },
    human: [`Subscriber ${imsi} removed.`],
    warnings
  };
}
