import { describe, it, expect } from "vitest";
import { payUri, proposalUrl, refundUri, uriContextFromRequest, type UriContext } from "../src/uri.js";

const plain: UriContext = { host: "shop.test", prefix: "-", instanceId: "default", https: false };
const proxied: UriContext = { host: "pay.shop.test", prefix: "merchant", instanceId: "books", https: true };

describe("uriContextFromRequest", () => {
  it("uses the Host header", () => {
    expect(uriContextFromRequest({ headers: { host: "shop.test" }, protocol: "http" }, "default")).toEqual(plain);
  });

  it("prefers forwarded headers", () => {
    const headers = {
      host: "internal:9966",
      "x-forwarded-host": "pay.shop.test",
      "x-forwarded-prefix": "merchant",
      "x-forwarded-proto": "https",
    };
    expect(uriContextFromRequest({ headers, protocol: "http" }, "books")).toEqual(proxied);
  });
});

describe("taler URIs", () => {
  it("builds pay URIs", () => {
    expect(payUri(plain, "o1")).toBe("taler://pay/shop.test/-/-/o1?insecure=1");
    expect(payUri(plain, "o1", "s1")).toBe("taler://pay/shop.test/-/-/o1/s1?insecure=1");
    expect(payUri(proxied, "o1")).toBe("taler://pay/pay.shop.test/merchant/books/o1");
  });

  it("builds refund URIs", () => {
    expect(refundUri(plain, "o1")).toBe("taler://refund/shop.test/-/-/o1?insecure=1");
    expect(refundUri(proxied, "o1")).toBe("taler://refund/pay.shop.test/merchant/books/o1");
  });

  it("builds proposal URLs", () => {
    expect(proposalUrl(plain, "o1")).toBe("http://shop.test/public/proposal?instance=default&order_id=o1");
    expect(proposalUrl({ ...proxied, prefix: "/merchant/" }, "o 1")).toBe(
      "https://pay.shop.test/merchant/public/proposal?instance=books&order_id=o+1",
    );
  });
});
