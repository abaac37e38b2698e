import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, UpdateDateColumn } from "typeorm";

@Entity()
export class Profile {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column()
    sex!: string;

    @Column("date")
    dateOfBirth!: string; // YYYY-MM-DD format

    @Column()
    socialSecurity!: string;

    @Column({ type: "varchar", nullable: true })
    picFile!: string | null;

    @Column({ default: false })
    isLookingForJob!: boolean;

    @CreateDateColumn()
    createdAt!: Date;

    @UpdateDateColumn()
    updatedAt!: Date;
}

export type PublicProfile = Omit<Profile, 'socialSecurity'>;

export function toPublicProfile(profile: Profile): PublicProfile {
    const { socialSecurity: _omitted, ...rest } = profile;
    return rest;
}
