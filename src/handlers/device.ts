// src/handlers/device.ts

import type { ActionHandler, ActionTable, DeviceConfig } from "../types.js";
import { escapeXml } from "../soap.js";
import { NS } from "../namespaces.js";

export function serviceXAddr(cfg: DeviceConfig, path: "device_service" | "media_service" | "ptz_service"): string {
  return `${cfg.publicBaseUrl.replace(/\/+$/, "")}/onvif/${path}`;
}

const getDeviceInformation: ActionHandler = (_params, { config }) => {
  const d = config.device;
  return `
    <tds:GetDeviceInformationResponse>
      <tds:Manufacturer>${escapeXml(d.manufacturer)}</tds:Manufacturer>
      <tds:Model>${escapeXml(d.model)}</tds:Model>
      <tds:FirmwareVersion>${escapeXml(d.firmwareVersion)}</tds:FirmwareVersion>
      <tds:SerialNumber>${escapeXml(d.serialNumber)}</tds:SerialNumber>
      <tds:HardwareId>${escapeXml(d.hardwareId)}</tds:HardwareId>
    </tds:GetDeviceInformationResponse>`;
};

const getCapabilities: ActionHandler = (_params, { config }) => `
    <tds:GetCapabilitiesResponse>
      <tds:Capabilities>
        <tt:Device>
          <tt:XAddr>${escapeXml(serviceXAddr(config, "device_service"))}</tt:XAddr>
          <tt:Network>
            <tt:IPFilter>false</tt:IPFilter>
            <tt:ZeroConfiguration>false</tt:ZeroConfiguration>
            <tt:IPVersion6>false</tt:IPVersion6>
            <tt:DynDNS>false</tt:DynDNS>
          </tt:Network>
          <tt:System>
            <tt:DiscoveryResolve>false</tt:DiscoveryResolve>
            <tt:DiscoveryBye>false</tt:DiscoveryBye>
            <tt:RemoteDiscovery>false</tt:RemoteDiscovery>
            <tt:SystemBackup>false</tt:SystemBackup>
            <tt:SystemLogging>false</tt:SystemLogging>
            <tt:FirmwareUpgrade>false</tt:FirmwareUpgrade>
          </tt:System>
          <tt:IO>
            <tt:InputConnectors>0</tt:InputConnectors>
            <tt:RelayOutputs>0</tt:RelayOutputs>
          </tt:IO>
          <tt:Security>
            <tt:TLS1.1>false</tt:TLS1.1>
            <tt:TLS1.2>false</tt:TLS1.2>
            <tt:OnboardKeyGeneration>false</tt:OnboardKeyGeneration>
            <tt:AccessPolicyConfig>false</tt:AccessPolicyConfig>
            <tt:X.509Token>false</tt:X.509Token>
            <tt:SAMLToken>false</tt:SAMLToken>
            <tt:KerberosToken>false</tt:KerberosToken>
            <tt:RELToken>false</tt:RELToken>
          </tt:Security>
        </tt:Device>
        <tt:Media>
          <tt:XAddr>${escapeXml(serviceXAddr(config, "media_service"))}</tt:XAddr>
          <tt:StreamingCapabilities>
            <tt:RTPMulticast>false</tt:RTPMulticast>
            <tt:RTP_TCP>true</tt:RTP_TCP>
            <tt:RTP_RTSP_TCP>true</tt:RTP_RTSP_TCP>
          </tt:StreamingCapabilities>
        </tt:Media>
        <tt:PTZ>
          <tt:XAddr>${escapeXml(serviceXAddr(config, "ptz_service"))}</tt:XAddr>
        </tt:PTZ>
      </tds:Capabilities>
    </tds:GetCapabilitiesResponse>`;

const getServices: ActionHandler = (_params, { config }) => {
  const entries: Array<[string, "device_service" | "media_service" | "ptz_service"]> = [
    [NS.tds, "device_service"],
    [NS.trt, "media_service"],
    [NS.tptz, "ptz_service"],
  ];
  const services = entries
    .map(
      ([ns, path]) => `
      <tds:Service>
        <tds:Namespace>${ns}</tds:Namespace>
        <tds:XAddr>${escapeXml(serviceXAddr(config, path))}</tds:XAddr>
        <tds:Version>
          <tt:Major>2</tt:Major>
          <tt:Minor>5</tt:Minor>
        </tds:Version>
      </tds:Service>`
    )
    .join("");
  return `
    <tds:GetServicesResponse>${services}
    </tds:GetServicesResponse>`;
};

const getSystemDateAndTime: ActionHandler = (_params, { now }) => `
    <tds:GetSystemDateAndTimeResponse>
      <tds:SystemDateAndTime>
        <tt:DateTimeType>NTP</tt:DateTimeType>
        <tt:DaylightSavings>false</tt:DaylightSavings>
        <tt:TimeZone>
          <tt:TZ>UTC</tt:TZ>
        </tt:TimeZone>
        <tt:UTCDateTime>
          <tt:Time>
            <tt:Hour>${now.getUTCHours()}</tt:Hour>
            <tt:Minute>${now.getUTCMinutes()}</tt:Minute>
            <tt:Second>${now.getUTCSeconds()}</tt:Second>
          </tt:Time>
          <tt:Date>
            <tt:Year>${now.getUTCFullYear()}</tt:Year>
            <tt:Month>${now.getUTCMonth() + 1}</tt:Month>
            <tt:Day>${now.getUTCDate()}</tt:Day>
          </tt:Date>
        </tt:UTCDateTime>
      </tds:SystemDateAndTime>
    </tds:GetSystemDateAndTimeResponse>`;

export const DEVICE_ACTIONS: ActionTable = new Map<string, ActionHandler>([
  ["GetDeviceInformation", getDeviceInformation],
  ["GetCapabilities", getCapabilities],
  ["GetServices", getServices],
  ["GetSystemDateAndTime", getSystemDateAndTime],
]);
