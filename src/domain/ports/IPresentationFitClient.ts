/**
 * IPresentationFitClient - Port for the optional presentation-fit scorer.
 * Implementations: PresentationFitClient
 */
export interface IPresentationFitClient {
    /**
     * Returns a 0..1 fit score of the image for the topic.
     */
    scoreFit(imageUrl: string, topic: string, signal?: AbortSignal): Promise<number>;
}
