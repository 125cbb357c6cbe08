// src/handlers/media.ts

import type { ActionHandler, ActionTable, DeviceConfig, MediaProfile } from "../types.js";
import { escapeXml } from "../soap.js";
import { NS } from "../namespaces.js";
import { findDescendant } from "../envelope.js";

export const DEFAULT_PROFILE_TOKEN = "Profile_1";

function renderProfile(p: MediaProfile): string {
  const token = escapeXml(p.token);
  const name = escapeXml(p.name);
  const v = p.video;
  const audio = p.audio
    ? `
        <tt:AudioEncoderConfiguration token="AudioEncoder_${token}">
          <tt:Name>${name} Audio Encoder</tt:Name>
          <tt:UseCount>1</tt:UseCount>
          <tt:Encoding>${escapeXml(p.audio.encoding)}</tt:Encoding>
          <tt:Bitrate>${p.audio.bitrate}</tt:Bitrate>
          <tt:SampleRate>${p.audio.sampleRate}</tt:SampleRate>
        </tt:AudioEncoderConfiguration>`
    : "";

  return `
      <trt:Profiles token="${token}" fixed="true">
        <tt:Name>${name}</tt:Name>
        <tt:VideoSourceConfiguration token="VideoSource_1">
          <tt:Name>Primary Video Source</tt:Name>
          <tt:UseCount>1</tt:UseCount>
          <tt:SourceToken>VideoSource_1</tt:SourceToken>
          <tt:Bounds x="0" y="0" width="${v.width}" height="${v.height}"/>
        </tt:VideoSourceConfiguration>
        <tt:VideoEncoderConfiguration token="VideoEncoder_${token}">
          <tt:Name>${name} Video Encoder</tt:Name>
          <tt:UseCount>1</tt:UseCount>
          <tt:Encoding>${escapeXml(v.encoding)}</tt:Encoding>
          <tt:Resolution>
            <tt:Width>${v.width}</tt:Width>
            <tt:Height>${v.height}</tt:Height>
          </tt:Resolution>
          <tt:Quality>5</tt:Quality>
          <tt:RateControl>
            <tt:FrameRateLimit>${v.framerate}</tt:FrameRateLimit>
            <tt:EncodingInterval>1</tt:EncodingInterval>
            <tt:BitrateLimit>${v.bitrate}</tt:BitrateLimit>
          </tt:RateControl>
        </tt:VideoEncoderConfiguration>${audio}
      </trt:Profiles>`;
}

/**
 * Profile named by trt:ProfileToken in the request, or the default profile
 * when the token is missing or unknown.
 */
export function resolveProfileToken(params: Element, cfg: DeviceConfig): string {
  const requested = findDescendant(params, NS.trt, "ProfileToken")?.textContent?.trim();
  if (requested && cfg.profiles.some((p) => p.token === requested)) return requested;
  return DEFAULT_PROFILE_TOKEN;
}

export function streamUriFor(cfg: DeviceConfig, profileToken: string): string {
  return `${cfg.rtspBaseUrl.replace(/\/+$/, "")}/${profileToken}`;
}

const getProfiles: ActionHandler = (_params, { config }) => `
    <trt:GetProfilesResponse>${config.profiles.map(renderProfile).join("")}
    </trt:GetProfilesResponse>`;

const getStreamUri: ActionHandler = (params, { config }) => {
  const uri = streamUriFor(config, resolveProfileToken(params, config));
  return `
    <trt:GetStreamUriResponse>
      <trt:MediaUri>
        <tt:Uri>${escapeXml(uri)}</tt:Uri>
        <tt:InvalidAfterConnect>false</tt:InvalidAfterConnect>
        <tt:InvalidAfterReboot>false</tt:InvalidAfterReboot>
        <tt:Timeout>PT30S</tt:Timeout>
      </trt:MediaUri>
    </trt:GetStreamUriResponse>`;
};

const getVideoSources: ActionHandler = (_params, { config }) => {
  const main = config.profiles[0];
  const width = main?.video.width ?? 1920;
  const height = main?.video.height ?? 1080;
  const framerate = main?.video.framerate ?? 30;
  return `
    <trt:GetVideoSourcesResponse>
      <trt:VideoSources token="VideoSource_1">
        <tt:Framerate>${framerate}</tt:Framerate>
        <tt:Resolution>
          <tt:Width>${width}</tt:Width>
          <tt:Height>${height}</tt:Height>
        </tt:Resolution>
      </trt:VideoSources>
    </trt:GetVideoSourcesResponse>`;
};

export const MEDIA_ACTIONS: ActionTable = new Map<string, ActionHandler>([
  ["GetProfiles", getProfiles],
  ["GetStreamUri", getStreamUri],
  ["GetVideoSources", getVideoSources],
]);
