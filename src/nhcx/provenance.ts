// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { basename } from "node:path";
import type { BuildContext } from "./types.js";
import type { FhirResource } from "./fhir-types.js";
import { CODE_SYSTEMS, profileMeta } from "./profiles.js";

/** Display name recorded as the agent acting on behalf of the author. */
export const CONVERTER_AGENT = "NHCX FHIR Converter";

/**
 * Provenance over every resource created before it, listing each source
 * PDF as a provenance entity.
 */
export function buildProvenance(
  id: string,
  targetRefs: string[],
  sourcePaths: string[],
  ctx: BuildContext,
): FhirResource {
  return {
    resourceType: "Provenance",
    id,
    meta: profileMeta("Provenance"),
    target: targetRefs.map((reference) => ({ reference })),
    recorded: ctx.timestamp,
    reason: [
      {
        coding: [{ system: CODE_SYSTEMS.ACT_REASON, code: "TREAT", display: "Treatment" }],
      },
    ],
    activity: {
      coding: [{ system: CODE_SYSTEMS.DATA_OPERATION, code: "CREATE", display: "Create" }],
    },
    agent: [
      {
        type: {
          coding: [{ system: CODE_SYSTEMS.PROVENANCE_AGENT, code: "author", display: "Author" }],
        },
        who: { reference: ctx.practitionerRef },
        onBehalfOf: { display: CONVERTER_AGENT },
      },
    ],
    entity: sourcePaths.map((path) => ({
      role: "source",
      what: { display: `Source PDF: ${path ? basename(path) : "unknown"}` },
    })),
  };
}
