export interface ConnectivityProbe {
  probe(): Promise<boolean>;
}
