import { afterEach, describe, it, expect, vi } from "vitest";
import { createPaystackGateway, verifyPaystackWebhookSignature } from "../paystack.js";
import { GatewayUnavailableError, InvalidSignatureError } from "../../utils/errors.js";
import { signWebhook, WEBHOOK_SECRET } from "../../__tests__/support/fake-gateway.js";

const options = {
  baseUrl: "https://paystack.test",
  secretKey: "test-secret",
  webhookSecret: WEBHOOK_SECRET,
  timeoutMs: 1000,
};

function respondWith(body: unknown, status = 200) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response(JSON.stringify(body), { status }));
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("initialize()", () => {
  it("sends the amount in minor units and maps the checkout session", async () => {
    const fetchMock = respondWith({
      status: true,
      message: "Authorization URL created",
      data: { authorization_url: "https://checkout.test/abc", access_code: "abc", reference: "INV_1" },
    });

    const session = await createPaystackGateway(options).initialize({
      email: "investor@example.test",
      amount: "1500.50",
      currency: "NGN",
      reference: "INV_1",
    });

    expect(session).toEqual({ reference: "INV_1", authorizationUrl: "https://checkout.test/abc", accessCode: "abc" });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://paystack.test/transaction/initialize");
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toMatchObject({ amount: 150050, reference: "INV_1", currency: "NGN" });
  });

  it("refuses to call out without a secret key", async () => {
    const fetchMock = respondWith({ status: true, data: {} });
    const gateway = createPaystackGateway({ ...options, secretKey: undefined });

    await expect(
      gateway.initialize({ email: "a@example.test", amount: "1.00", currency: "NGN", reference: "INV_2" }),
    ).rejects.toThrow("PAYSTACK_SECRET_KEY is not configured");
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe("verify()", () => {
  it("maps abandoned transactions to failed", async () => {
    respondWith({
      status: true,
      data: { id: 4099, status: "abandoned", reference: "INV_1", amount: 10000, gateway_response: "The transaction was not completed" },
    });

    const status = await createPaystackGateway(options).verify("INV_1");

    expect(status.status).toBe("failed");
    expect(status.gatewayId).toBe("4099");
    expect(status.amountMinor).toBe(10000);
    expect(status.gatewayResponse).toBe("The transaction was not completed");
  });

  it("treats unknown statuses as pending", async () => {
    respondWith({ status: true, data: { status: "ongoing", reference: "INV_1" } });
    const status = await createPaystackGateway(options).verify("INV_1");
    expect(status.status).toBe("pending");
  });

  it("surfaces HTTP errors as gateway unavailable", async () => {
    respondWith({ status: false, message: "Server error" }, 503);
    await expect(createPaystackGateway(options).verify("INV_1")).rejects.toBeInstanceOf(GatewayUnavailableError);
  });

  it("surfaces a false status envelope with its message", async () => {
    respondWith({ status: false, message: "Invalid key" });
    await expect(createPaystackGateway(options).verify("INV_1")).rejects.toThrow("Paystack error: Invalid key");
  });

  it("wraps network failures", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new Error("connect ECONNREFUSED");
      }),
    );
    await expect(createPaystackGateway(options).verify("INV_1")).rejects.toThrow(
      "Paystack request failed: connect ECONNREFUSED",
    );
  });
});

describe("reading the response body", () => {
  it("reports a timeout during the body read as gateway unavailable", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        const body = new ReadableStream<Uint8Array>({
          start(controller) {
            controller.error(Object.assign(new Error("The operation was aborted due to timeout"), { name: "TimeoutError" }));
          },
        });
        return new Response(body, { status: 200 });
      }),
    );

    const attempt = createPaystackGateway(options).verify("INV_1");

    await expect(attempt).rejects.toBeInstanceOf(GatewayUnavailableError);
    await expect(attempt).rejects.toThrow(/^Paystack response could not be read: /);
  });

  it("reports a non-JSON success body as gateway unavailable", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("<html>maintenance</html>", { status: 200 })),
    );

    const attempt = createPaystackGateway(options).verify("INV_1");

    await expect(attempt).rejects.toBeInstanceOf(GatewayUnavailableError);
    await expect(attempt).rejects.toMatchObject({ statusCode: 502 });
  });
});

describe("parseWebhook()", () => {
  const gateway = createPaystackGateway(options);

  it("accepts a correctly signed charge event", () => {
    const body = JSON.stringify({
      event: "charge.success",
      data: { id: 77, reference: "INV_1", amount: 10000, gateway_response: "Successful" },
    });

    const event = gateway.parseWebhook(body, signWebhook(body));

    expect(event.event).toBe("charge.success");
    expect(event.reference).toBe("INV_1");
    expect(event.gatewayId).toBe("77");
    expect(event.amountMinor).toBe(10000);
  });

  it("rejects a missing or wrong signature", () => {
    const body = JSON.stringify({ event: "charge.success", data: { reference: "INV_1" } });
    expect(() => gateway.parseWebhook(body, undefined)).toThrow(InvalidSignatureError);
    expect(() => gateway.parseWebhook(body, signWebhook(body, "other-secret"))).toThrow(InvalidSignatureError);
  });

  it("reports signed bodies it cannot read", () => {
    expect(gateway.parseWebhook("not json", signWebhook("not json")).event).toBe("unparseable");
    const odd = JSON.stringify({ hello: "world" });
    expect(gateway.parseWebhook(odd, signWebhook(odd)).event).toBe("unrecognized");
  });
});

describe("verifyPaystackWebhookSignature()", () => {
  it("returns false for a signature of the wrong length", () => {
    expect(verifyPaystackWebhookSignature("{}", "abc", WEBHOOK_SECRET)).toBe(false);
    expect(verifyPaystackWebhookSignature("{}", signWebhook("{}"), WEBHOOK_SECRET)).toBe(true);
  });
});
