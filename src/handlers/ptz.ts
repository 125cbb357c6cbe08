// src/handlers/ptz.ts
// Simulated PTZ: moves are acknowledged, nothing actually moves.

import type { ActionHandler, ActionTable } from "../types.js";

const SPACES = {
  absPanTilt: "http://www.onvif.org/ver10/tptz/PanTiltSpaces/PositionGenericSpace",
  absZoom: "http://www.onvif.org/ver10/tptz/ZoomSpaces/PositionGenericSpace",
  relPanTilt: "http://www.onvif.org/ver10/tptz/PanTiltSpaces/TranslationGenericSpace",
  relZoom: "http://www.onvif.org/ver10/tptz/ZoomSpaces/TranslationGenericSpace",
  contPanTilt: "http://www.onvif.org/ver10/tptz/PanTiltSpaces/VelocityGenericSpace",
  contZoom: "http://www.onvif.org/ver10/tptz/ZoomSpaces/VelocityGenericSpace",
  speedPanTilt: "http://www.onvif.org/ver10/tptz/PanTiltSpaces/GenericSpeedSpace",
  speedZoom: "http://www.onvif.org/ver10/tptz/ZoomSpaces/ZoomGenericSpeedSpace",
} as const;

const getConfigurations: ActionHandler = () => `
    <tptz:GetConfigurationsResponse>
      <tptz:PTZConfiguration token="PTZ_1">
        <tt:Name>Primary PTZ Configuration</tt:Name>
        <tt:UseCount>1</tt:UseCount>
        <tt:NodeToken>PTZ_Node_1</tt:NodeToken>
        <tt:DefaultAbsolutePantTiltPositionSpace>${SPACES.absPanTilt}</tt:DefaultAbsolutePantTiltPositionSpace>
        <tt:DefaultAbsoluteZoomPositionSpace>${SPACES.absZoom}</tt:DefaultAbsoluteZoomPositionSpace>
        <tt:DefaultRelativePanTiltTranslationSpace>${SPACES.relPanTilt}</tt:DefaultRelativePanTiltTranslationSpace>
        <tt:DefaultRelativeZoomTranslationSpace>${SPACES.relZoom}</tt:DefaultRelativeZoomTranslationSpace>
        <tt:DefaultContinuousPanTiltVelocitySpace>${SPACES.contPanTilt}</tt:DefaultContinuousPanTiltVelocitySpace>
        <tt:DefaultContinuousZoomVelocitySpace>${SPACES.contZoom}</tt:DefaultContinuousZoomVelocitySpace>
        <tt:DefaultPTZSpeed>
          <tt:PanTilt x="0.1" y="0.1" space="${SPACES.speedPanTilt}"/>
          <tt:Zoom x="0.1" space="${SPACES.speedZoom}"/>
        </tt:DefaultPTZSpeed>
        <tt:DefaultPTZTimeout>PT5S</tt:DefaultPTZTimeout>
      </tptz:PTZConfiguration>
    </tptz:GetConfigurationsResponse>`;

const getNodes: ActionHandler = () => `
    <tptz:GetNodesResponse>
      <tptz:PTZNode token="PTZ_Node_1" FixedHomePosition="false">
        <tt:Name>Primary PTZ Node</tt:Name>
        <tt:SupportedPTZSpaces>
          <tt:AbsolutePanTiltPositionSpace>
            <tt:URI>${SPACES.absPanTilt}</tt:URI>
            <tt:XRange>
              <tt:Min>-180</tt:Min>
              <tt:Max>180</tt:Max>
            </tt:XRange>
            <tt:YRange>
              <tt:Min>-90</tt:Min>
              <tt:Max>90</tt:Max>
            </tt:YRange>
          </tt:AbsolutePanTiltPositionSpace>
          <tt:AbsoluteZoomPositionSpace>
            <tt:URI>${SPACES.absZoom}</tt:URI>
            <tt:XRange>
              <tt:Min>0</tt:Min>
              <tt:Max>1</tt:Max>
            </tt:XRange>
          </tt:AbsoluteZoomPositionSpace>
        </tt:SupportedPTZSpaces>
        <tt:MaximumNumberOfPresets>16</tt:MaximumNumberOfPresets>
        <tt:HomeSupported>true</tt:HomeSupported>
      </tptz:PTZNode>
    </tptz:GetNodesResponse>`;

const getStatus: ActionHandler = (_params, { now }) => `
    <tptz:GetStatusResponse>
      <tptz:PTZStatus>
        <tt:Position>
          <tt:PanTilt x="0.0" y="0.0" space="${SPACES.absPanTilt}"/>
          <tt:Zoom x="0.0" space="${SPACES.absZoom}"/>
        </tt:Position>
        <tt:MoveStatus>
          <tt:PanTilt>IDLE</tt:PanTilt>
          <tt:Zoom>IDLE</tt:Zoom>
        </tt:MoveStatus>
        <tt:UtcTime>${now.toISOString().replace(/\.\d{3}Z$/, "Z")}</tt:UtcTime>
      </tptz:PTZStatus>
    </tptz:GetStatusResponse>`;

function acknowledge(action: string): ActionHandler {
  return () => `
    <tptz:${action}Response/>`;
}

export const PTZ_ACTIONS: ActionTable = new Map<string, ActionHandler>([
  ["GetConfigurations", getConfigurations],
  ["GetNodes", getNodes],
  ["GetStatus", getStatus],
  ["AbsoluteMove", acknowledge("AbsoluteMove")],
  ["RelativeMove", acknowledge("RelativeMove")],
  ["ContinuousMove", acknowledge("ContinuousMove")],
  ["Stop", acknowledge("Stop")],
]);
