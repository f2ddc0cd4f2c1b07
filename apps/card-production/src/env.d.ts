declare namespace NodeJS {
  export interface ProcessEnv {
    readonly GP_COMMAND?: string;
    readonly GIDS_TOOL?: string;
    readonly PKCS15_INIT?: string;
    readonly PKCS15_TOOL?: string;
    readonly OPENPGP_TOOL?: string;
    readonly OPENSC_EXPLORER?: string;
    readonly GIDS_CAP_FILE?: string;
    readonly SMARTPGP_CAP_FILE?: string;
  }
}
