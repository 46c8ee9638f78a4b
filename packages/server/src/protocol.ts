import { z } from "zod";

/** Everything a client may send over the socket. */
const text = (max: number) => z.string().max(max);

export const ClientIntentSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("CreateRoom"),
    displayName: text(200),
    roomName: text(200).optional(),
  }),
  z.object({ type: z.literal("JoinRoom"), code: text(16), displayName: text(200) }),
  z.object({
    type: z.literal("RejoinRoom"),
    code: text(16),
    playerId: text(64),
    resumeToken: text(128),
  }),
  z.object({ type: z.literal("LeaveRoom") }),
  z.object({ type: z.literal("ListRooms") }),
  z.object({ type: z.literal("Rename"), displayName: text(200) }),
  z.object({ type: z.literal("StartGame") }),
  z.object({ type: z.literal("SubmitResponse"), text: text(4_000) }),
  z.object({ type: z.literal("RequestAssist"), idea: text(4_000) }),
  z.object({ type: z.literal("CastVote"), targetPlayerId: text(64) }),
  z.object({ type: z.literal("ContinueGame") }),
  z.object({ type: z.literal("EndGame") }),
]);

export type ClientIntent = z.infer<typeof ClientIntentSchema>;

export type ParsedIntent =
  | { readonly ok: true; readonly intent: ClientIntent }
  | { readonly ok: false; readonly message: string; readonly intent?: string };

/** Decode one raw socket frame. */
export function parseClientIntent(raw: string): ParsedIntent {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return { ok: false, message: "Message is not valid JSON" };
  }

  const result = ClientIntentSchema.safeParse(data);
  if (result.success) {
    return { ok: true, intent: result.data };
  }

  const intent = intentTypeOf(data);
  return {
    ok: false,
    message: result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; "),
    ...(intent !== undefined ? { intent } : {}),
  };
}

function intentTypeOf(data: unknown): string | undefined {
  if (typeof data !== "object" || data === null || !("type" in data)) {
    return undefined;
  }
  return typeof data.type === "string" ? data.type : undefined;
}
