import { describe, expect, it } from "vitest";

import { escapeHtml, renderVerificationEmail } from "./resend";

describe("renderVerificationEmail", () => {
  const payload = {
    to: "user@example.com",
    name: "Ada",
    link: "http://localhost:4000/api/auth/verify-email/abc.def.ghi",
  };

  it("puts the link in both the html and text bodies", () => {
    const { subject, html, text } = renderVerificationEmail(payload);

    expect(subject).toBe("Confirm your email on Contact-App");
    expect(html).toContain(`<a href="${payload.link}">${payload.link}</a>`);
    expect(text).toContain(`Open this link to confirm: ${payload.link}`);
    expect(html).toContain("Hi Ada,");
  });

  it("escapes user-controlled values in html", () => {
    const { html } = renderVerificationEmail({ ...payload, name: '<img src=x onerror="alert(1)">' });

    expect(html).toContain("Hi &lt;img src=x onerror=&quot;alert(1)&quot;&gt;,");
  });
});

describe("escapeHtml", () => {
  it("escapes the five significant characters", () => {
    expect(escapeHtml(`&<>"'`)).toBe("&amp;&lt;&gt;&quot;&#39;");
  });
});
