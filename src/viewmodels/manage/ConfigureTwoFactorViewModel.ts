export interface SelectListItem {
    text: string;
    value: string;
    selected: boolean;
}

export interface ConfigureTwoFactorViewModel {
    selectedProvider?: string;
    providers: SelectListItem[];
}

export function buildConfigureTwoFactorViewModel(
    providers: string[],
    selectedProvider?: string
): ConfigureTwoFactorViewModel {
    return {
        selectedProvider,
        providers: providers.map((provider) => ({
            text: provider,
            value: provider,
            selected: provider === selectedProvider,
        })),
    };
}
