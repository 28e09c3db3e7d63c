import { describe, expect, it } from "vitest";
import { getMediaServiceOptions, parseConfig } from "../../src/config";
import { baseTestEnv, createTestConfig } from "../factories/test-config";

describe("config", () => {
  it("applies media service defaults", () => {
    const config = createTestConfig();

    expect(config.MEDIA_SERVICES_ARM_ENDPOINT).toBe("https://management.azure.com/");
    expect(config.MEDIA_TRANSFORM_NAME).toBe("Content Adaptive Multiple Bitrate MP4");
    expect(config.MEDIA_STREAMING_POLICY).toBe("Predefined_ClearStreamingOnly");
    expect(config.UPLOAD_SAS_TTL_MINUTES).toBe(60);
    expect(config.INGEST_CONTAINER).toBe("ingest");
    expect(config.INGEST_STORAGE_CONNECTION_STRING).toBeUndefined();
  });

  it("projects the media services settings block", () => {
    const options = getMediaServiceOptions(createTestConfig());

    expect(options).toEqual({
      aadTenantId: "test-tenant",
      armEndpoint: new URL("https://management.azure.com/"),
      aadClientId: "test-client",
      aadSecret: "test-secret",
      subscriptionId: "test-subscription",
      resourceGroup: "test-group",
      accountName: "testaccount",
    });
  });

  it("names every missing credential", () => {
    const { MEDIA_SERVICES_AAD_SECRET, MEDIA_SERVICES_ACCOUNT_NAME, ...rest } =
      baseTestEnv;

    expect(() => parseConfig(rest)).toThrow(
      "MediaEncodingService configuration invalid: MEDIA_SERVICES_AAD_SECRET: Required; MEDIA_SERVICES_ACCOUNT_NAME: Required"
    );
    expect(MEDIA_SERVICES_AAD_SECRET).toBe("test-secret");
    expect(MEDIA_SERVICES_ACCOUNT_NAME).toBe("testaccount");
  });
});
