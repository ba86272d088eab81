/**
 * Types for GMP commands and the objects they return
 */

// A parsed XML element: attributes under "@_name", text under "#text", children by tag name
export type XmlNode = Record<string, unknown>;

export interface GmpResponse {
  command: string;
  status: string;
  statusText: string;
  body: XmlNode;
}

export interface GmpTargetInfo {
  id: string;
  name: string;
  hosts: string[];
  comment: string;
}

export interface GmpTaskInfo {
  id: string;
  name: string;
  comment: string;
  status: string;
  progress: number;
  targetId?: string;
  currentReportId?: string;
  lastReportId?: string;
}

// Scan configs and scanners only matter to us by id and name
export interface GmpNamedObject {
  id: string;
  name: string;
}

export interface CreateTargetCommand {
  name: string;
  hosts: string[];
  portListId: string;
  comment?: string;
}

export interface CreateTaskCommand {
  name: string;
  targetId: string;
  configId: string;
  scannerId: string;
  comment?: string;
}

export interface GetReportOptions {
  filter: string;
  details: boolean;
}
