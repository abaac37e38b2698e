export interface UserLoginInfo {
    loginProvider: string;
    providerKey: string;
    providerDisplayName: string;
}

/** An external authentication scheme the site is configured with. */
export interface AuthenticationDescription {
    authenticationScheme: string;
    displayName: string;
}

export interface ManageLoginsViewModel {
    currentLogins: UserLoginInfo[];
    otherLogins: AuthenticationDescription[];
}

export function buildManageLoginsViewModel(
    currentLogins: UserLoginInfo[],
    schemes: AuthenticationDescription[]
): ManageLoginsViewModel {
    const linked = new Set(currentLogins.map((login) => login.loginProvider));
    return {
        currentLogins,
        otherLogins: schemes.filter((scheme) => !linked.has(scheme.authenticationScheme)),
    };
}
