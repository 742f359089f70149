import { EC2Client, type DescribeInstancesCommandOutput } from "@aws-sdk/client-ec2";
import { describe, expect, it } from "vitest";

import { RegionAccessError } from "../utils/errors";
import { EC2ListingClient, ec2ClientFactory } from "./clients";

// Short-circuits the middleware stack so no request leaves the process.
function stubbedClient(respond: () => DescribeInstancesCommandOutput) {
  const client = new EC2Client({
    region: "us-east-1",
    credentials: { accessKeyId: "test", secretAccessKey: "test-secret" },
  });
  const inputs: unknown[] = [];
  client.middlewareStack.add(
    () => async (args) => {
      inputs.push(args.input);
      return { output: respond(), response: {} };
    },
    { step: "initialize", name: "stubDescribeInstances" }
  );
  return { client, inputs };
}

const EMPTY_PAGE: DescribeInstancesCommandOutput = { Reservations: [], $metadata: {} };

describe("EC2ListingClient", () => {
  it("sends NextToken and MaxResults", async () => {
    const { client, inputs } = stubbedClient(() => ({ ...EMPTY_PAGE, NextToken: "t2" }));
    const listing = new EC2ListingClient(client, "us-east-1", { pageSize: 50 });

    const result = await listing.listInstances("t1");

    expect(inputs).toEqual([{ NextToken: "t1", MaxResults: 50 }]);
    expect(result.NextToken).toBe("t2");
  });

  it("leaves both out on a first page with default sizing", async () => {
    const { client, inputs } = stubbedClient(() => EMPTY_PAGE);

    await new EC2ListingClient(client, "us-east-1", { requestTimeoutMs: 1000 }).listInstances();

    expect(inputs).toEqual([{}]);
  });

  it("translates access failures", async () => {
    const { client } = stubbedClient(() => {
      throw Object.assign(new Error("You are not authorized to perform this operation."), {
        name: "UnauthorizedOperation",
        $metadata: { httpStatusCode: 403 },
      });
    });

    const result = new EC2ListingClient(client, "us-west-2").listInstances();

    await expect(result).rejects.toBeInstanceOf(RegionAccessError);
    await expect(result).rejects.toMatchObject({ region: "us-west-2", category: "permission" });
  });

  it("rethrows other failures untouched", async () => {
    const failure = new RangeError("unexpected page");
    const { client } = stubbedClient(() => {
      throw failure;
    });

    await expect(new EC2ListingClient(client, "us-east-1").listInstances()).rejects.toBe(failure);
  });
});

describe("ec2ClientFactory", () => {
  it("builds a listing client per region", () => {
    const factory = ec2ClientFactory({ pageSize: 100 });

    expect(factory("eu-central-1")).toBeInstanceOf(EC2ListingClient);
  });
});
