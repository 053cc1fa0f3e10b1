import type {
  AbsolutePoint,
  Color,
  HAlign,
  LineCap,
  LineJoin,
  VAlign,
} from "./geometry.js";

// ---- Resolved shapes (millimetres, ready for a backend) ----

export type ResolvedShape =
  | { kind: "rectangle"; x: number; y: number; width: number; height: number }
  | { kind: "circle"; cx: number; cy: number; r: number }
  | {
      kind: "ellipse";
      center: AbsolutePoint;
      xPoint: AbsolutePoint;
      yPoint: AbsolutePoint;
    }
  | { kind: "polygon"; points: AbsolutePoint[] }
  | { kind: "lines"; points: AbsolutePoint[] }
  | {
      kind: "curve";
      anchor0: AbsolutePoint;
      ctrl0: AbsolutePoint;
      ctrl1: AbsolutePoint;
      anchor1: AbsolutePoint;
    }
  | {
      kind: "text";
      x: number;
      y: number;
      value: string;
      halign: HAlign;
      valign: VAlign;
      rotation: number;
    }
  | {
      kind: "bitmap";
      x: number;
      y: number;
      width: number;
      height: number;
      mime: string;
      data: Uint8Array;
    };

export interface ResolvedForm {
  primitives: ResolvedShape[];
}

// ---- Resolved property values ----

export type ResolvedPropertyValue =
  | { kind: "stroke"; color: Color }
  | { kind: "fill"; color: Color }
  | { kind: "lineWidth"; value: number }
  | { kind: "strokeDash"; pattern: number[] }
  | { kind: "lineCap"; value: LineCap }
  | { kind: "lineJoin"; value: LineJoin }
  | { kind: "fillOpacity"; value: number }
  | { kind: "strokeOpacity"; value: number }
  | { kind: "visible"; value: boolean }
  | { kind: "clip"; points: AbsolutePoint[] }
  | { kind: "font"; family: string }
  | { kind: "fontSize"; value: number }
  | { kind: "svgId"; value: string }
  | { kind: "svgClass"; value: string }
  | { kind: "svgAttribute"; name: string; value: string }
  | { kind: "jsCall"; event: string; code: string }
  | { kind: "jsInclude"; source: string; code?: string };

export interface ResolvedProperty {
  channel: string;
  primitives: ResolvedPropertyValue[];
}

/** One step of a depth-first scene traversal. */
export type RenderEvent =
  | { type: "push"; properties: ResolvedProperty[] }
  | { type: "draw"; form: ResolvedForm }
  | { type: "pop" };
