export function buildOpenApiSpec(serviceBaseUrl: string) {
  return {
    openapi: "3.0.3",
    info: {
      title: "Token Ledger Service API",
      version: "0.1.0",
      description:
        "Fungible and unique asset registries. Amounts and ids are decimal strings, byte fields hex.",
    },
    servers: [{ url: serviceBaseUrl }],
    paths: {
      "/health": {
        get: {
          summary: "Health check",
          responses: {
            "200": { description: "Service healthy" },
          },
        },
      },
      "/assets": {
        post: {
          summary: "Create a fungible asset owned by the caller",
          responses: {
            "201": { description: "Asset created" },
            "401": { description: "Unauthenticated" },
          },
        },
      },
      "/assets/{assetId}": {
        get: {
          summary: "Get asset details and metadata",
          parameters: [
            {
              in: "path",
              name: "assetId",
              required: true,
              schema: { type: "string" },
            },
          ],
          responses: {
            "200": { description: "Asset" },
            "400": { description: "Invalid asset id" },
            "404": { description: "Asset not found" },
          },
        },
      },
      "/assets/{assetId}/metadata": {
        put: {
          summary: "Set hex name and symbol (owner only)",
          parameters: [
            {
              in: "path",
              name: "assetId",
              required: true,
              schema: { type: "string" },
            },
          ],
          responses: {
            "200": { description: "Metadata set" },
            "400": { description: "Invalid request" },
            "401": { description: "Unauthenticated" },
            "403": { description: "Caller is not the owner" },
            "404": { description: "Asset not found" },
          },
        },
      },
      "/assets/{assetId}/mint": {
        post: {
          summary: "Mint to a recipient (owner only)",
          parameters: [
            {
              in: "path",
              name: "assetId",
              required: true,
              schema: { type: "string" },
            },
          ],
          responses: {
            "200": { description: "Minted" },
            "400": { description: "Invalid request" },
            "401": { description: "Unauthenticated" },
            "403": { description: "Caller is not the owner" },
            "404": { description: "Asset not found" },
          },
        },
      },
      "/assets/{assetId}/burn": {
        post: {
          summary: "Burn up to the caller's balance",
          parameters: [
            {
              in: "path",
              name: "assetId",
              required: true,
              schema: { type: "string" },
            },
          ],
          responses: {
            "200": { description: "Burned" },
            "400": { description: "Invalid request" },
            "401": { description: "Unauthenticated" },
            "404": { description: "Asset not found" },
          },
        },
      },
      "/assets/{assetId}/transfer": {
        post: {
          summary: "Transfer up to the caller's balance",
          parameters: [
            {
              in: "path",
              name: "assetId",
              required: true,
              schema: { type: "string" },
            },
          ],
          responses: {
            "200": { description: "Transferred" },
            "400": { description: "Invalid request" },
            "401": { description: "Unauthenticated" },
            "404": { description: "Asset not found" },
          },
        },
      },
      "/assets/{assetId}/balances/{account}": {
        get: {
          summary: "Balance of one account",
          parameters: [
            {
              in: "path",
              name: "assetId",
              required: true,
              schema: { type: "string" },
            },
            {
              in: "path",
              name: "account",
              required: true,
              schema: { type: "string" },
            },
          ],
          responses: {
            "200": { description: "Balance" },
            "404": { description: "Asset not found" },
          },
        },
      },
      "/assets/{assetId}/holders": {
        get: {
          summary: "Accounts with a recorded balance",
          parameters: [
            {
              in: "path",
              name: "assetId",
              required: true,
              schema: { type: "string" },
            },
          ],
          responses: {
            "200": { description: "Holders" },
            "404": { description: "Asset not found" },
          },
        },
      },
      "/assets/{assetId}/audit": {
        get: {
          summary: "Compare supply with the sum of balances",
          parameters: [
            {
              in: "path",
              name: "assetId",
              required: true,
              schema: { type: "string" },
            },
          ],
          responses: {
            "200": { description: "Audit" },
            "404": { description: "Asset not found" },
          },
        },
      },
      "/uniques": {
        post: {
          summary: "Mint a unique asset with its whole supply to the caller",
          responses: {
            "201": { description: "Unique asset created" },
            "400": { description: "Invalid request or zero supply" },
            "401": { description: "Unauthenticated" },
            "409": { description: "Asset id space exhausted" },
          },
        },
      },
      "/uniques/{assetId}": {
        get: {
          summary: "Get unique asset details",
          parameters: [
            {
              in: "path",
              name: "assetId",
              required: true,
              schema: { type: "string" },
            },
          ],
          responses: {
            "200": { description: "Unique asset" },
            "400": { description: "Invalid asset id" },
            "404": { description: "Asset not found" },
          },
        },
      },
      "/uniques/{assetId}/burn": {
        post: {
          summary: "Burn up to the caller's holding",
          parameters: [
            {
              in: "path",
              name: "assetId",
              required: true,
              schema: { type: "string" },
            },
          ],
          responses: {
            "200": { description: "Burned" },
            "400": { description: "Invalid request" },
            "401": { description: "Unauthenticated" },
            "404": { description: "Asset not found" },
            "409": { description: "Caller holds none" },
          },
        },
      },
      "/uniques/{assetId}/transfer": {
        post: {
          summary: "Transfer up to the caller's holding",
          parameters: [
            {
              in: "path",
              name: "assetId",
              required: true,
              schema: { type: "string" },
            },
          ],
          responses: {
            "200": { description: "Transferred" },
            "400": { description: "Invalid request" },
            "401": { description: "Unauthenticated" },
            "404": { description: "Asset not found" },
            "409": { description: "Caller holds none" },
          },
        },
      },
      "/uniques/{assetId}/balances/{account}": {
        get: {
          summary: "Holding of one account",
          parameters: [
            {
              in: "path",
              name: "assetId",
              required: true,
              schema: { type: "string" },
            },
            {
              in: "path",
              name: "account",
              required: true,
              schema: { type: "string" },
            },
          ],
          responses: {
            "200": { description: "Balance" },
            "404": { description: "Asset not found" },
          },
        },
      },
      "/uniques/{assetId}/holders": {
        get: {
          summary: "Accounts with a recorded holding",
          parameters: [
            {
              in: "path",
              name: "assetId",
              required: true,
              schema: { type: "string" },
            },
          ],
          responses: {
            "200": { description: "Holders" },
            "404": { description: "Asset not found" },
          },
        },
      },
      "/uniques/{assetId}/audit": {
        get: {
          summary: "Compare supply with the sum of holdings",
          parameters: [
            {
              in: "path",
              name: "assetId",
              required: true,
              schema: { type: "string" },
            },
          ],
          responses: {
            "200": { description: "Audit" },
            "404": { description: "Asset not found" },
          },
        },
      },
      "/events": {
        get: {
          summary: "Committed ledger events in sequence order",
          parameters: [
            {
              in: "query",
              name: "registry",
              required: false,
              schema: { type: "string" },
            },
            {
              in: "query",
              name: "assetId",
              required: false,
              schema: { type: "string" },
            },
            {
              in: "query",
              name: "after",
              required: false,
              schema: { type: "integer" },
            },
            {
              in: "query",
              name: "limit",
              required: false,
              schema: { type: "integer" },
            },
          ],
          responses: {
            "200": { description: "Event page" },
            "400": { description: "Invalid filter" },
          },
        },
      },
    },
  };
}
