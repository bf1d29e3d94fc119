import { buildPatRecord, generatePatSecret, toPatView } from "../../auth/pat";
import { AccessError } from "../../types/errors";
import type { FoundationCommitterTokens } from "../capabilities";
import type { CapabilityScope } from "../context";

const PAT_ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function foundationCommitterTokens(scope: CapabilityScope, uid: string): FoundationCommitterTokens {
  const { ctx } = scope;
  return {
    async issue(label) {
      if (ctx.principal?.via !== "identity_provider") {
        throw new AccessError("UNAUTHENTICATED", "personal access tokens can only be issued after identity provider sign-in");
      }
      const plaintext = generatePatSecret();
      const record = buildPatRecord({ uid, label: label?.trim() || null, plaintext, at: ctx.now() });
      const tx = ctx.tx();
      await ctx.mediate({ action: "pat.issue", subject: record.id, scope }, () => tx.tokens.insert(record));
      return { plaintext, token: toPatView(record) };
    },

    async list() {
      const records = await ctx.tx().tokens.listForUid(uid);
      return records.map(toPatView);
    },

    async revoke(patId) {
      const tx = ctx.tx();
      const record = PAT_ID_PATTERN.test(patId) ? await tx.tokens.get(patId) : null;
      if (!record) {
        throw new AccessError("NOT_FOUND", "no such personal access token", { patId });
      }
      if (record.uid !== uid && !ctx.isAdministrator()) {
        throw new AccessError("FORBIDDEN", "only the owner or an administrator may revoke this token", { patId });
      }
      const revoked = await ctx.mediate({ action: "pat.revoke", subject: patId, scope }, () =>
        tx.tokens.revoke(patId, uid, ctx.now().toISOString())
      );
      if (!revoked) {
        throw new AccessError("NOT_FOUND", "no such personal access token", { patId });
      }
      return toPatView(revoked);
    },
  };
}
