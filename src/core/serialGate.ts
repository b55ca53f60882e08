/**
 * Sezione critica asincrona: le callback passate a `runExclusive` girano una alla volta,
 * nell'ordine di arrivo. È il punto unico che rende atomici "claim identificativo"
 * e "riserva quota" tra più contesti worker concorrenti.
 */
export class SerialGate {
    private tail: Promise<void> = Promise.resolve();
    private waiting = 0;

    runExclusive<T>(callback: () => Promise<T>): Promise<T> {
        this.waiting += 1;
        const result = this.tail.then(callback);
        this.tail = result.then(
            () => this.release(),
            () => this.release(),
        );
        return result;
    }

    get queued(): number {
        return this.waiting;
    }

    private release(): void {
        this.waiting -= 1;
    }
}
