import { RawTable } from './table';

export interface DashboardCredentials {
  username: string;
  password: string;
}

/**
 * Browser-side collaborator of a snapshot run. Produces an authenticated page
 * showing the follow-ups table; everything else about the browser stays behind it.
 */
export interface DashboardSession {
  open(): Promise<void>;
  login(credentials: DashboardCredentials): Promise<void>;
  openFollowUps(): Promise<void>;
  readTables(): Promise<RawTable[]>;
  /** Never throws; false when nothing was written. */
  captureScreenshot(outputPath: string): Promise<boolean>;
  close(): Promise<void>;
}
