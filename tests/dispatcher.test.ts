import { describe, it, expect } from "vitest";
import { ActionDispatcher } from "../src/dispatcher.js";
import { DEFAULT_DEVICE_INFO, DEFAULT_PROFILES } from "../src/config.js";
import { parseXml } from "../src/envelope.js";
import { NS } from "../src/namespaces.js";
import { wrapSuccess } from "../src/soap.js";
import type { DeviceConfig, HandlerResult, ServiceName } from "../src/types.js";

const NOW = new Date("2026-03-01T08:09:10.000Z");

const CONFIG: DeviceConfig = {
  device: { ...DEFAULT_DEVICE_INFO, manufacturer: "Acme & Sons" },
  profiles: DEFAULT_PROFILES,
  publicBaseUrl: "http://camera.test:8000/",
  rtspBaseUrl: "rtsp://camera.test:554/stream",
};

const EXPECTED: Record<ServiceName, string[]> = {
  Device: ["GetDeviceInformation", "GetCapabilities", "GetServices", "GetSystemDateAndTime"],
  Media: ["GetProfiles", "GetStreamUri", "GetVideoSources"],
  PTZ: ["GetConfigurations", "GetNodes", "GetStatus", "AbsoluteMove", "RelativeMove", "ContinuousMove", "Stop"],
};

const SERVICE_NS: Record<ServiceName, string> = { Device: NS.tds, Media: NS.trt, PTZ: NS.tptz };

function actionElement(service: ServiceName, name: string, inner = ""): Element {
  return parseXml(`<${name} xmlns="${SERVICE_NS[service]}">${inner}</${name}>`).documentElement;
}

function body(result: HandlerResult): string {
  if (result.kind !== "body") throw new Error(`expected body, got unsupported ${result.actionName}`);
  return result.body;
}

describe("ActionDispatcher tables", () => {
  const dispatcher = new ActionDispatcher(CONFIG);

  it.each(["Device", "Media", "PTZ"] as const)("%s exposes exactly its closed action set", (service) => {
    expect(dispatcher.supportedActions(service)).toEqual(EXPECTED[service]);
  });

  for (const service of ["Device", "Media", "PTZ"] as const) {
    for (const action of EXPECTED[service]) {
      it(`${service}.${action} yields a well-formed ${action}Response`, () => {
        const out = body(dispatcher.dispatch(service, action, actionElement(service, action), NOW));
        const doc = parseXml(wrapSuccess(out));
        const responses = doc.getElementsByTagNameNS(SERVICE_NS[service], `${action}Response`);
        expect(responses.length).toBe(1);
      });
    }
  }

  it.each([
    ["Device", "FooBar"],
    ["Media", "GetDeviceInformation"],
    ["PTZ", "GetProfiles"],
    ["Device", "getdeviceinformation"],
    ["Media", "toString"],
    ["PTZ", ""],
  ] as const)("%s.%s is unsupported", (service, action) => {
    expect(dispatcher.dispatch(service, action, actionElement("Device", "X"), NOW)).toEqual({
      kind: "unsupported",
      actionName: action,
    });
  });
});

describe("handler content", () => {
  const dispatcher = new ActionDispatcher(CONFIG);

  it("reports the configured device identity, escaped", () => {
    const out = body(dispatcher.dispatch("Device", "GetDeviceInformation", actionElement("Device", "X"), NOW));
    expect(out).toContain("<tds:Manufacturer>Acme &amp; Sons</tds:Manufacturer>");
    expect(out).toContain("<tds:Model>Simulated Camera</tds:Model>");
    expect(out).toContain("<tds:SerialNumber>ONVIF-001</tds:SerialNumber>");
  });

  it("builds XAddrs from the public base URL", () => {
    const out = body(dispatcher.dispatch("Device", "GetCapabilities", actionElement("Device", "X"), NOW));
    expect(out).toContain("<tt:XAddr>http://camera.test:8000/onvif/media_service</tt:XAddr>");
  });

  it("reports the request clock in UTC", () => {
    const out = body(dispatcher.dispatch("Device", "GetSystemDateAndTime", actionElement("Device", "X"), NOW));
    expect(out).toContain("<tt:Hour>8</tt:Hour>");
    expect(out).toContain("<tt:Minute>9</tt:Minute>");
    expect(out).toContain("<tt:Second>10</tt:Second>");
    expect(out).toContain("<tt:Month>3</tt:Month>");
    expect(out).toContain("<tt:Year>2026</tt:Year>");
  });

  it("lists every configured profile", () => {
    const out = body(dispatcher.dispatch("Media", "GetProfiles", actionElement("Media", "GetProfiles"), NOW));
    const doc = parseXml(wrapSuccess(out));
    const profiles = doc.getElementsByTagNameNS(NS.trt, "Profiles");
    expect(profiles.length).toBe(2);
    expect(profiles.item(0)?.getAttribute("token")).toBe("Profile_1");
    expect(doc.getElementsByTagNameNS(NS.tt, "AudioEncoderConfiguration").length).toBe(1);
  });

  it.each([
    ["<ProfileToken>Profile_2</ProfileToken>", "rtsp://camera.test:554/stream/Profile_2"],
    ["<ProfileToken>Profile_9</ProfileToken>", "rtsp://camera.test:554/stream/Profile_1"],
    ["", "rtsp://camera.test:554/stream/Profile_1"],
    [`<ProfileToken xmlns="urn:example:other">Profile_2</ProfileToken>`, "rtsp://camera.test:554/stream/Profile_1"],
  ])("GetStreamUri with %j resolves to %s", (inner, uri) => {
    const params = actionElement("Media", "GetStreamUri", inner);
    const out = body(dispatcher.dispatch("Media", "GetStreamUri", params, NOW));
    expect(out).toContain(`<tt:Uri>${uri}</tt:Uri>`);
  });

  it("reports PTZ status time from the request clock", () => {
    const out = body(dispatcher.dispatch("PTZ", "GetStatus", actionElement("PTZ", "GetStatus"), NOW));
    expect(out).toContain("<tt:UtcTime>2026-03-01T08:09:10Z</tt:UtcTime>");
  });

  it("dispatches through injected tables", () => {
    const custom = new ActionDispatcher(CONFIG, {
      Device: new Map([["Ping", () => "<tds:PingResponse/>"]]),
      Media: new Map(),
      PTZ: new Map(),
    });
    expect(custom.dispatch("Device", "Ping", actionElement("Device", "Ping"), NOW)).toEqual({
      kind: "body",
      body: "<tds:PingResponse/>",
    });
    expect(custom.dispatch("Device", "GetDeviceInformation", actionElement("Device", "X"), NOW).kind).toBe(
      "unsupported"
    );
  });
});
