/**
 * ns-3 program generator.
 *
 * Emits a C++ program with one CSMA channel per topology edge and a TapBridge
 * device on each side of it, so external containers can attach to the
 * simulated links through tap interfaces.
 */

import {
  deriveEdgeEndpoints,
  edgeDatarate,
  edgeDelay,
  edgeNetwork,
  parseDelay,
  type DelayUnit,
  type NormalizedDelay
} from "../../shared/derivation";
import type { TopologyModel } from "../../shared/parsing/TopologyModel";
import { DEFAULT_NS3_LOG_COMPONENT, DEFAULT_SIMULATION_STOP_SECONDS } from "../../utils/consts";

export interface Ns3ProgramOptions {
  /** Simulated run time in seconds */
  stopSeconds?: number;
  /** NS_LOG_COMPONENT_DEFINE name */
  logComponent?: string;
}

const INDENT = "    ";

const NS3_TIME_FUNCTIONS: Record<DelayUnit, string> = {
  ms: "MilliSeconds",
  us: "MicroSeconds",
  s: "Seconds"
};

/**
 * `TimeValue(MilliSeconds(10))` and friends.
 */
export function toNs3TimeValue(delay: NormalizedDelay): string {
  return `TimeValue(${NS3_TIME_FUNCTIONS[delay.unit]}(${delay.magnitude}))`;
}

/** C++ string literal; JSON string escaping is valid C++ for these values. */
function cppString(value: string): string {
  return JSON.stringify(value);
}

function commentText(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

function formatSeconds(seconds: number): string {
  return Number.isInteger(seconds) ? seconds.toFixed(1) : String(seconds);
}

function header(logComponent: string): string[] {
  return [
    `#include "ns3/core-module.h"`,
    `#include "ns3/csma-module.h"`,
    `#include "ns3/network-module.h"`,
    `#include "ns3/tap-bridge-module.h"`,
    "",
    "#include <fstream>",
    "#include <iostream>",
    "",
    "using namespace ns3;",
    "",
    `NS_LOG_COMPONENT_DEFINE(${cppString(logComponent)});`,
    "",
    "int main(int argc, char* argv[])",
    "{",
    `${INDENT}CommandLine cmd(__FILE__);`,
    `${INDENT}cmd.Parse(argc, argv);`,
    "",
    `${INDENT}// Real-time simulation + enable checksums`,
    `${INDENT}GlobalValue::Bind("SimulatorImplementationType", StringValue("ns3::RealtimeSimulatorImpl"));`,
    `${INDENT}GlobalValue::Bind("ChecksumEnabled", BooleanValue(true));`,
    ""
  ];
}

function nodeSection(model: TopologyModel): string[] {
  const names = model.orderedNodes().map((n) => commentText(model.nodeName(n.id)));
  const createLine = `${INDENT}n.Create(${model.nodeCount});`;
  return [
    `${INDENT}// Create ${model.nodeCount} ghost nodes`,
    `${INDENT}NodeContainer n;`,
    names.length > 0 ? `${createLine} // ${names.join(", ")}` : createLine,
    ""
  ];
}

function linkSection(model: TopologyModel): string[] {
  const lines: string[] = [];
  for (const edge of model.edges()) {
    const k = edge.position + 1;
    const sourceIndex = model.nodeIndex(edge.source);
    const targetIndex = model.nodeIndex(edge.target);
    const delay = parseDelay(edgeDelay(edge), { edgeId: edge.id });

    lines.push(
      `${INDENT}// --- LAN ${commentText(edgeNetwork(edge))} (${commentText(edge.source)} <-> ${commentText(edge.target)}) ---`,
      `${INDENT}CsmaHelper csma${k};`,
      `${INDENT}csma${k}.SetChannelAttribute("DataRate", StringValue(${cppString(edgeDatarate(edge))}));`,
      `${INDENT}csma${k}.SetChannelAttribute("Delay", ${toNs3TimeValue(delay)});`,
      `${INDENT}NetDeviceContainer d${k} = csma${k}.Install(NodeContainer(n.Get(${sourceIndex}), n.Get(${targetIndex})));`,
      ""
    );
  }
  return lines;
}

function tapBridgeSection(model: TopologyModel): string[] {
  const tapsByNode = new Map<number, string[]>();
  const addTap = (nodeIndex: number, line: string): void => {
    const list = tapsByNode.get(nodeIndex) ?? [];
    list.push(line);
    tapsByNode.set(nodeIndex, list);
  };

  for (const edge of model.edges()) {
    const k = edge.position + 1;
    const { a, b } = deriveEdgeEndpoints(model, edge);
    addTap(
      a.nodeIndex,
      `tb.SetAttribute("DeviceName", StringValue(${cppString(a.tapDevice)})); tb.Install(n.Get(${a.nodeIndex}), d${k}.Get(0));`
    );
    addTap(
      b.nodeIndex,
      `tb.SetAttribute("DeviceName", StringValue(${cppString(b.tapDevice)})); tb.Install(n.Get(${b.nodeIndex}), d${k}.Get(1));`
    );
  }

  const lines = [
    `${INDENT}// Setup TapBridge`,
    `${INDENT}TapBridgeHelper tb;`,
    `${INDENT}tb.SetAttribute("Mode", StringValue("UseBridge"));`,
    ""
  ];
  const ordered = model.orderedNodes();
  for (const nodeIndex of Array.from(tapsByNode.keys()).sort((x, y) => x - y)) {
    lines.push(`${INDENT}// ${commentText(model.nodeName(ordered[nodeIndex].id))}`);
    for (const tap of tapsByNode.get(nodeIndex) ?? []) {
      lines.push(`${INDENT}${tap}`);
    }
  }
  return lines;
}

function footer(stopSeconds: number): string[] {
  return [
    "",
    `${INDENT}// Run simulation for ${stopSeconds} seconds`,
    `${INDENT}Simulator::Stop(Seconds(${formatSeconds(stopSeconds)}));`,
    `${INDENT}Simulator::Run();`,
    `${INDENT}Simulator::Destroy();`,
    "",
    `${INDENT}return 0;`,
    "}",
    ""
  ];
}

/**
 * Generates the ns-3 C++ program for a topology.
 *
 * @throws InvalidDelayError if an edge delay cannot be parsed
 */
export function generateNs3Program(model: TopologyModel, options: Ns3ProgramOptions = {}): string {
  const stopSeconds = options.stopSeconds ?? DEFAULT_SIMULATION_STOP_SECONDS;
  const logComponent = options.logComponent ?? DEFAULT_NS3_LOG_COMPONENT;

  return [
    ...header(logComponent),
    ...nodeSection(model),
    ...linkSection(model),
    ...tapBridgeSection(model),
    ...footer(stopSeconds)
  ].join("\n");
}
