/**
 * Dataset Validation Endpoint
 *
 * Checks one uploaded table against its column contract and returns the
 * normalised rows with a violation report.
 */

import { OpenAPIRoute, contentJson } from "chanfana";
import { z } from "zod";
import { assertLoaded, validateAndLoad } from "../../services/engine";
import type { AppContext } from "../../types";
import { success } from "../../utils/response";
import { ErrorEnvelopeSchema, ValidateDatasetRequestSchema, envelope } from "../../schemas/analytics";

/**
 * POST /v1/datasets/validate
 */
export class ValidateDataset extends OpenAPIRoute {
  public schema = {
    tags: ["Datasets"],
    summary: "Validate an uploaded dataset",
    description: `
Validate a table of influencers, posts, tracking events or payouts.

**Modes:**
- **tolerant** (default): invalid rows are dropped and reported, valid rows are returned
- **strict**: any violation rejects the table with 422 SCHEMA_VIOLATION
    `.trim(),
    operationId: "validate-dataset",
    request: {
      body: contentJson(ValidateDatasetRequestSchema)
    },
    responses: {
      "200": {
        description: "Validation result with normalised rows",
        content: {
          "application/json": {
            schema: envelope(z.object({
              kind: z.string(),
              ok: z.boolean(),
              rowCount: z.number(),
              validRowCount: z.number(),
              rejectedRowCount: z.number(),
              violations: z.array(z.object({
                column: z.string(),
                problem: z.string(),
                message: z.string(),
                rowIndices: z.array(z.number()),
                totalRows: z.number()
              })),
              rows: z.array(z.record(z.string(), z.unknown()))
            }))
          }
        }
      },
      "400": {
        description: "Unknown dataset kind",
        content: { "application/json": { schema: ErrorEnvelopeSchema } }
      },
      "422": {
        description: "Strict validation rejected the table",
        content: { "application/json": { schema: ErrorEnvelopeSchema } }
      }
    }
  };

  public async handle(c: AppContext) {
    const data = await this.getValidatedData<typeof this.schema>();
    const { kind, rows, strict } = data.body;

    const result = assertLoaded(validateAndLoad(kind, rows, { strict }));

    return success(c, {
      kind: result.kind,
      ok: result.ok,
      rowCount: result.rowCount,
      validRowCount: result.validRowCount,
      rejectedRowCount: result.rejectedRowCount,
      violations: result.violations,
      rows: result.rows
    });
  }
}
