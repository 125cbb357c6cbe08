import { describe, it, expect } from "vitest";
import { authenticationFault, escapeXml, wrapFault, wrapSuccess } from "../src/soap.js";
import { elementChildren, findChild, parseXml } from "../src/envelope.js";
import { NS } from "../src/namespaces.js";

describe("wrapSuccess", () => {
  it("places the fragment inside the body", () => {
    const doc = parseXml(wrapSuccess("<tds:GetServicesResponse/>"));
    const root = doc.documentElement;
    expect(root.namespaceURI).toBe(NS.soap);
    const soapBody = findChild(root, NS.soap, "Body");
    const children = soapBody ? elementChildren(soapBody) : [];
    expect(children).toHaveLength(1);
    expect(children[0]?.namespaceURI).toBe(NS.tds);
    expect(children[0]?.localName).toBe("GetServicesResponse");
  });
});

describe("wrapFault", () => {
  it("uses the two-level code/reason structure", () => {
    const doc = parseXml(wrapFault("Sender", "Authentication failed"));
    expect(doc.getElementsByTagNameNS(NS.soap, "Value").item(0)?.textContent).toBe("soap:Sender");
    const text = doc.getElementsByTagNameNS(NS.soap, "Text").item(0);
    expect(text?.textContent).toBe("Authentication failed");
    expect(text?.getAttribute("xml:lang")).toBe("en");
  });

  it("escapes the reason", () => {
    expect(wrapFault("Receiver", "a < b & c")).toContain(
      '<soap:Text xml:lang="en">a &lt; b &amp; c</soap:Text>'
    );
  });

  it("builds the authentication fault", () => {
    expect(authenticationFault()).toBe(wrapFault("Sender", "Authentication failed"));
  });
});

describe("escapeXml", () => {
  it("escapes markup characters", () => {
    expect(escapeXml(`<"a" & 'b'>`)).toBe("&lt;&quot;a&quot; &amp; &apos;b&apos;&gt;");
    expect(escapeXml(42)).toBe("42");
  });
});
