export type ReindexId = string | number;

export type DecodedPayload = {
  ids: string[];
  fields: string[];
};

export const FALLBACK_FIELDS = "all";
export const IDS_SEPARATOR = ",";
export const FIELDS_IDS_SEPARATOR = ";";

/**
 * Wire format shared with the batch worker: `id1,id2;field1,field2`.
 * Ids and field names must not contain either separator.
 */
export const serializePayload = (ids: readonly ReindexId[], fields?: readonly string[]): string => {
  const effectiveFields = fields && fields.length > 0 ? fields : [FALLBACK_FIELDS];
  return [ids.join(IDS_SEPARATOR), effectiveFields.join(IDS_SEPARATOR)].join(FIELDS_IDS_SEPARATOR);
};

const splitList = (value: string): string[] => (value === "" ? [] : value.split(IDS_SEPARATOR));

export const deserializePayload = (payload: string): DecodedPayload => {
  const separatorAt = payload.indexOf(FIELDS_IDS_SEPARATOR);
  const rawIds = separatorAt === -1 ? payload : payload.slice(0, separatorAt);
  const rawFields = separatorAt === -1 ? "" : payload.slice(separatorAt + 1);
  const fields = splitList(rawFields);

  return {
    ids: splitList(rawIds),
    fields: fields.length > 0 ? fields : [FALLBACK_FIELDS]
  };
};

// A single full reindex request widens the whole batch to all fields.
export const mergePayloads = (payloads: readonly string[]): DecodedPayload => {
  const ids = new Set<string>();
  const fields = new Set<string>();

  for (const payload of payloads) {
    const decoded = deserializePayload(payload);
    decoded.ids.forEach((id) => ids.add(id));
    decoded.fields.forEach((field) => fields.add(field));
  }

  return {
    ids: Array.from(ids),
    fields: fields.has(FALLBACK_FIELDS) || fields.size === 0 ? [FALLBACK_FIELDS] : Array.from(fields)
  };
};
