/**
 * All success/failure detection on device responses goes through here, so
 * marker text can change without touching the session state machine.
 */
export interface ResponseClassifier {
    isError(response: string): boolean;
    isComplete(response: string): boolean;
}

export interface MarkerSet {
    errorMarkers: string[];
    completionMarkers: string[];
}

export const JUNOS_MARKERS: MarkerSet = {
    errorMarkers: ['error', 'unknown command'],
    completionMarkers: ['complete'],
};

export function createMarkerClassifier(markers: MarkerSet = JUNOS_MARKERS): ResponseClassifier {
    const errors = markers.errorMarkers.map(m => m.toLowerCase());
    const completions = markers.completionMarkers.map(m => m.toLowerCase());

    return {
        isError: (response) => {
            const text = response.toLowerCase();
            return errors.some(m => text.includes(m));
        },
        isComplete: (response) => {
            const text = response.toLowerCase();
            return completions.some(m => text.includes(m));
        },
    };
}

export const junosClassifier = createMarkerClassifier();
