/**
 * vCon (Virtual Conversation) Types
 * Based on IETF draft-ietf-vcon-vcon-container
 * https://ietf-wg-vcon.github.io/draft-ietf-vcon-vcon-container/draft-ietf-vcon-vcon-container.html
 */

/** Civic address for party geolocation */
export interface CivicAddress {
  country?: string;
  a1?: string;
  a2?: string;
  a3?: string;
  a4?: string;
  a5?: string;
  a6?: string;
  prd?: string;
  pod?: string;
  sts?: string;
  hno?: string;
  hns?: string;
  lmk?: string;
  loc?: string;
  flr?: string;
  nam?: string;
  pc?: string;
}

/** Role of a party in the conversation */
export type PartyRole =
  | "agent"
  | "customer"
  | "supervisor"
  | "sme"
  | "thirdparty";

/** Party - a participant in the conversation. Every field is optional. */
export interface Party {
  tel?: string;
  mailto?: string;
  name?: string;
  stir?: string;
  validation?: string;
  uuid?: string;
  role?: PartyRole;
  gmlpos?: string;
  civicaddress?: CivicAddress;
  timezone?: string;
  contact_list?: string;
}

/** Dialog type - the kind of conversation element */
export type DialogType = "recording" | "text" | "transfer" | "incomplete";

/** How an inline `body` is encoded */
export type Encoding = "base64url" | "json" | "none";

/** Party history event for tracking joins/drops */
export interface PartyHistoryEvent {
  event: "join" | "drop" | "hold" | "unhold" | "mute" | "unmute";
  party: number;
  time: string;
}

/** Dialog - a single element of conversation (recording, text, etc.) */
export interface Dialog {
  type: DialogType;
  start: string;
  duration?: number;
  parties: number | number[];
  originator?: number;
  mediatype?: string;
  filename?: string;
  body?: string;
  encoding?: Encoding;
  url?: string;
  content_hash?: string | string[];
  disposition?: string;
  party_history?: PartyHistoryEvent[];
  campaign?: string;
  interaction_type?: string;
  interaction_id?: string;
  skill?: string;
  application?: string;
  message_id?: string;
  // Transfer-specific fields
  transferee?: number;
  transferor?: number;
  transfer_target?: number;
  original?: number;
  consultation?: number;
  target_dialog?: number;
}

/** Analysis type - the kind of derived data */
export type AnalysisType =
  | "summary"
  | "transcript"
  | "translation"
  | "sentiment"
  | "tts";

/** Analysis - derived data from the conversation */
export interface Analysis {
  type: AnalysisType | string;
  dialog?: number | number[];
  mediatype?: string;
  filename?: string;
  vendor: string;
  product?: string;
  schema?: string;
  body?: string | object;
  encoding?: Encoding;
  url?: string;
  content_hash?: string | string[];
}

/** Attachment - related documents */
export interface Attachment {
  type?: string;
  start?: string;
  party?: number;
  dialog?: number;
  mediatype?: string;
  filename?: string;
  body?: string | object;
  encoding?: Encoding;
  url?: string;
  content_hash?: string | string[];
}

/**
 * Reference to another vCon, used by `redacted`, `appended` and `group`.
 * The referenced container is either inline (`body`) or external (`url`).
 */
export interface VconReference {
  uuid: string;
  type?: string;
  url?: string;
  content_hash?: string | string[];
  body?: string | object;
  encoding?: Encoding;
  mediatype?: string;
}

/** Main vCon container */
export interface Vcon {
  vcon: string;
  uuid: string;
  created_at: string;
  updated_at?: string;
  subject?: string;
  redacted?: VconReference;
  appended?: VconReference;
  group?: VconReference[];
  parties: Party[];
  dialog?: Dialog[];
  analysis?: Analysis[];
  attachments?: Attachment[];
}

/** vCon with guaranteed arrays (after normalization) */
export interface NormalizedVcon extends Vcon {
  dialog: Dialog[];
  analysis: Analysis[];
  attachments: Attachment[];
}

/** A container is plain JSON, wrapped in a JWS, or wrapped in a JWE. */
export type VconState = "unsigned" | "signed" | "encrypted";

/** `unknown` covers input that matches none of the three shapes */
export type DetectedVconState = VconState | "unknown";

/** Path/message pair reported for a failed check */
export interface IssueDetail {
  path: string;
  message: string;
}
