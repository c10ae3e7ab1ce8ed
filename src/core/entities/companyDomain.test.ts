import { describe, expect, it } from "vitest";
import {
  cleanCompanyName,
  isOwnDomain,
  type CompanyIdentity,
} from "./companyDomain";

const company: CompanyIdentity = {
  companyName: "Acme Cement Corp",
  domains: ["acme.example"],
};

describe("cleanCompanyName", () => {
  it("drops trailing legal forms as whole words", () => {
    expect(cleanCompanyName("Acme Cement Co., Ltd.")).toBe("acmecement");
    expect(cleanCompanyName("Northwind, Inc.")).toBe("northwind");
    expect(cleanCompanyName("台灣水泥股份有限公司")).toBe("台灣水泥");
  });

  it("keeps legal-form letters that sit inside a word", () => {
    expect(cleanCompanyName("Lincoln Electric")).toBe("lincolnelectric");
    expect(cleanCompanyName("Princeton Holdings")).toBe("princetonholdings");
    expect(cleanCompanyName("Coca Company")).toBe("coca");
  });
});

describe("isOwnDomain", () => {
  it("matches configured domains and their subdomains", () => {
    expect(isOwnDomain("https://acme.example/esg", company)).toBe(true);
    expect(isOwnDomain("https://ir.acme.example/report", company)).toBe(true);
    expect(isOwnDomain("https://notacme.example/", company)).toBe(false);
  });

  it("matches hosts that carry the company name without legal suffixes", () => {
    expect(isOwnDomain("https://www.acme-cement.example.test/", company)).toBe(
      true,
    );
    expect(isOwnDomain("https://news.example.test/acme-cement", company)).toBe(
      false,
    );
  });

  it("recognizes names that contain a legal-form substring", () => {
    expect(
      isOwnDomain("https://www.lincolnelectric.com/sustainability", {
        companyName: "Lincoln Electric",
        domains: [],
      }),
    ).toBe(true);
  });

  it("ignores non-web urls", () => {
    expect(isOwnDomain("ftp://acme.example/report", company)).toBe(false);
  });
});
